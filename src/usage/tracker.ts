// ── Usage Tracking ───────────────────────────────────────
// Records every completion: model, purpose, tokens, latency.
// In-memory store; resets on restart.

export interface UsageEntry {
  timestamp: Date;
  model: string;
  /** What the call was for, e.g. "router" or "faq". */
  purpose: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  latencyMs: number;
}

/** Keep at most this many entries; older ones are dropped. */
const MAX_ENTRIES = 5_000;

export class UsageTracker {
  private entries: UsageEntry[] = [];
  private readonly startTime: Date;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.startTime = now();
  }

  record(
    model: string,
    purpose: string,
    inputTokens: number,
    outputTokens: number,
    latencyMs: number,
  ): UsageEntry {
    const entry: UsageEntry = {
      timestamp: this.now(),
      model,
      purpose,
      inputTokens,
      outputTokens,
      totalTokens: inputTokens + outputTokens,
      latencyMs,
    };

    this.entries.push(entry);
    if (this.entries.length > MAX_ENTRIES) {
      this.entries = this.entries.slice(-MAX_ENTRIES);
    }
    return entry;
  }

  /** Calls grouped by purpose. */
  getCallsByPurpose(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const e of this.entries) {
      counts[e.purpose] = (counts[e.purpose] ?? 0) + 1;
    }
    return counts;
  }

  /** Summary stats, one line per figure. */
  getSummary(): string {
    if (this.entries.length === 0) {
      return "No usage data yet.";
    }

    const totalCalls = this.entries.length;
    const totalInput = this.entries.reduce((s, e) => s + e.inputTokens, 0);
    const totalOutput = this.entries.reduce((s, e) => s + e.outputTokens, 0);
    const avgLatency =
      this.entries.reduce((s, e) => s + e.latencyMs, 0) / totalCalls;
    const byPurpose = Object.entries(this.getCallsByPurpose())
      .map(([purpose, count]) => `${purpose}=${count}`)
      .join(", ");

    return [
      `Uptime: ${this.getUptime()}`,
      `Total calls: ${totalCalls} (${byPurpose})`,
      `Input tokens: ${totalInput}`,
      `Output tokens: ${totalOutput}`,
      `Avg latency: ${Math.round(avgLatency)}ms`,
    ].join("\n");
  }

  getUptime(): string {
    const ms = this.now().getTime() - this.startTime.getTime();
    const secs = Math.floor(ms / 1000);
    const mins = Math.floor(secs / 60);
    const hours = Math.floor(mins / 60);

    if (hours > 0) return `${hours}h ${mins % 60}m`;
    if (mins > 0) return `${mins}m ${secs % 60}s`;
    return `${secs}s`;
  }

  getCallCount(): number {
    return this.entries.length;
  }
}
