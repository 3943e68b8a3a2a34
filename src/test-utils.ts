import type { Logger } from "./logger.js";

export interface LogLine {
  level: keyof Logger;
  message: string;
}

export interface RecordingLogger extends Logger {
  lines: LogLine[];
  messages(level: keyof Logger): string[];
}

// keeps every log call so tests can assert on what the user saw.
export function createRecordingLogger(): RecordingLogger {
  const lines: LogLine[] = [];
  const record = (level: keyof Logger) => (message: string) => {
    lines.push({ level, message });
  };

  return {
    lines,
    info: record("info"),
    success: record("success"),
    warn: record("warn"),
    error: record("error"),
    debug: record("debug"),
    command: record("command"),
    messages: (level) =>
      lines.filter((line) => line.level === level).map((line) => line.message),
  };
}

export interface FetchCall {
  url: string;
  init?: RequestInit;
}

// in-process stand-in for the Ollama HTTP API.
export function createFakeFetch(
  reply: (url: string, init?: RequestInit) => Response | Promise<Response>
): { fetch: typeof fetch; calls: FetchCall[] } {
  const calls: FetchCall[] = [];
  const fakeFetch: typeof fetch = async (input, init) => {
    const url = input instanceof Request ? input.url : String(input);
    calls.push({ url, init });
    return reply(url, init);
  };
  return { fetch: fakeFetch, calls };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}
