import { describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { TOOL_NAMES, type ToolInput, type ToolName } from "./schemas.js";
import type {
  ToolContext,
  ToolDefinition,
  ToolOutcome,
  ToolResult,
} from "./types.js";

type ToolTable = { [N in ToolName]?: ToolDefinition<N> };

/** Default timeout for tool execution (15 seconds) */
const DEFAULT_TOOL_TIMEOUT_MS = 15_000;

// ── Tool Registry ────────────────────────────────────────

export class ToolRegistry {
  private readonly tools: ToolTable = {};

  constructor(
    private readonly logger: Logger,
    private readonly timeoutMs: number = DEFAULT_TOOL_TIMEOUT_MS,
  ) {}

  register<N extends ToolName>(tool: ToolDefinition<N>): this {
    const tools: { [K in N]?: ToolDefinition<K> } = this.tools;
    tools[tool.name] = tool;
    return this;
  }

  has(name: ToolName): boolean {
    return this.tools[name] !== undefined;
  }

  names(): ToolName[] {
    return TOOL_NAMES.filter((n) => this.has(n));
  }

  /**
   * Validate arguments, then execute with a timeout. Any failure (bad
   * arguments, unknown tool, thrown error, timeout) comes back as
   * `success: false`; this method never rejects.
   */
  async invoke<N extends ToolName>(
    name: N,
    input: ToolInput<N>,
    ctx: ToolContext = {},
  ): Promise<ToolResult> {
    const startTime = Date.now();
    const args = toArgRecord(input);
    const fail = (message: string, error?: string): ToolResult => ({
      name,
      args,
      success: false,
      notFound: false,
      result: message,
      error: error ?? message,
      durationMs: Date.now() - startTime,
    });

    const tool = this.tools[name];
    if (!tool) {
      return fail(`Unknown tool: ${name}`);
    }

    const parsed = tool.schema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      this.logger.warn({ tool: name, issues }, "⚠️ Invalid tool arguments");
      return fail(`Invalid arguments for ${name}: ${issues}`);
    }

    let timer: NodeJS.Timeout | undefined;
    try {
      const outcome = await Promise.race<ToolOutcome>([
        tool.execute(parsed.data, ctx),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () =>
              reject(
                new Error(
                  `Tool "${name}" timed out after ${this.timeoutMs / 1000}s`,
                ),
              ),
            this.timeoutMs,
          );
        }),
      ]);

      const result: ToolResult = {
        name,
        args,
        success: outcome.status === "ok",
        notFound: outcome.status === "not_found",
        result: outcome.text,
        durationMs: Date.now() - startTime,
      };
      this.logger.info(
        {
          tool: name,
          success: result.success,
          notFound: result.notFound,
          durationMs: result.durationMs,
          correlationId: ctx.correlationId,
        },
        "🔧 Tool call",
      );
      return result;
    } catch (err) {
      const message = describeError(err);
      this.logger.error(
        { tool: name, error: message, correlationId: ctx.correlationId },
        "❌ Tool execution failed",
      );
      return fail(`${name} is unavailable right now.`, message);
    } finally {
      clearTimeout(timer);
    }
  }
}

function toArgRecord(input: unknown): Record<string, unknown> {
  if (typeof input !== "object" || input === null) return {};
  return Object.fromEntries(Object.entries(input));
}
