/**
 * Debug Channels
 *
 * Targeted debug logging for the rendering pipeline: which window a span was
 * resolved to, why two labels were (or were not) merged, what gutter depth a
 * snippet got.
 *
 * ## Usage
 *
 * Enable via environment variable:
 * ```bash
 * SPANLIGHT_DEBUG=resolve npm test         # Just span resolution
 * SPANLIGHT_DEBUG=merge,render npm test    # Multiple channels
 * SPANLIGHT_DEBUG=* npm test               # Everything
 * ```
 *
 * In code (always present, no-op when disabled):
 * ```typescript
 * debug.merge("window.merged", { labels: 2, lines: [3, 7] });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

/** Configuration for debug output */
export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  /** Include timestamps in output */
  timestamps: boolean;
  /** Custom output function (defaults to console.error, keeping stdout clean for reports) */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: (message) => console.error(message),
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env["SPANLIGHT_DEBUG"] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

let enabledChannels = parseDebugEnv();

/** Channels created through getDebugChannel() */
const extraChannels = new Map<string, DebugChannel>();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";

  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData): string {
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value, 0)}`);
  if (parts.length === 0) return "{}";
  const inline = `{ ${parts.join(", ")} }`;
  if (inline.length <= 100) return inline;
  return `{\n  ${parts.join(",\n  ")}\n}`;
}

function formatValue(value: unknown, depth: number): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return JSON.stringify(`${value.slice(0, 57)}...`);
    return JSON.stringify(value);
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 4 && depth < 2) {
      return `[${value.map((v) => formatValue(v, depth + 1)).join(", ")}]`;
    }
    return `[${value.length} items]`;
  }
  if (typeof value === "object") {
    if ("name" in value && typeof value.name === "string") return `<${value.name}>`;
    return depth < 1 ? `{...${Object.keys(value).length}}` : "{...}";
  }
  return String(value);
}

/**
 * Create a debug channel. Enablement is checked once, at creation time.
 */
function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/**
 * Get or create an extra debug channel by name (for host tools built on top).
 */
export function getDebugChannel(name: string): DebugChannel {
  const key = name.trim().toLowerCase();
  if (!key) return () => {};
  const existing = extraChannels.get(key);
  if (existing) return existing;
  const channel = createChannel(key);
  extraChannels.set(key, channel);
  return channel;
}

/**
 * Re-read SPANLIGHT_DEBUG and rebuild every channel.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.resolve = createChannel("resolve");
  debug.merge = createChannel("merge");
  debug.render = createChannel("render");
  debug.report = createChannel("report");
  for (const name of extraChannels.keys()) {
    extraChannels.set(name, createChannel(name));
  }
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/**
 * Check if a channel (or any channel) is enabled.
 */
export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Byte offset -> line/column resolution and context extraction */
  resolve: createChannel("resolve"),

  /** Window merging of labeled spans */
  merge: createChannel("merge"),

  /** Snippet layout and rendering */
  render: createChannel("render"),

  /** Report assembly (header, causes, related diagnostics) */
  report: createChannel("report"),
};

export type Debug = typeof debug;
