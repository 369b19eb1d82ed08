import {
  type HttpMethod,
  isHttpMethod,
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
} from "@httptok/engine";

export type CliCommand =
  | { command: "help" }
  | { command: "parse"; file?: string; response: boolean }
  | {
      command: "serve";
      port: number;
      host: string;
      quiet: boolean;
      timeoutMs: number;
      logLevel: LogLevel;
    }
  | {
      command: "request";
      host: string;
      port: number;
      path: string;
      method: HttpMethod;
      headers: Record<string, string>;
      data?: string;
      timeoutMs: number;
    };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const DEFAULT_TIMEOUT_MS = 5000;

function parseInteger(value: string | undefined, flag: string): number {
  if (value === undefined || !/^[0-9]+$/.test(value)) {
    throw new UsageError(`${flag} expects a non-negative integer`);
  }
  return Number.parseInt(value, 10);
}

function requireValue(value: string | undefined, flag: string): string {
  if (value === undefined) {
    throw new UsageError(`${flag} expects a value`);
  }
  return value;
}

function parseTarget(target: string): { host: string; port: number } {
  const colon = target.lastIndexOf(":");
  if (colon <= 0) {
    throw new UsageError(`Expected <host:port>, got "${target}"`);
  }
  return {
    host: target.slice(0, colon),
    port: parseInteger(target.slice(colon + 1), "port"),
  };
}

function parseLogLevel(value: string | undefined, flag: string): LogLevel {
  const level = requireValue(value, flag);
  if (!isLogLevel(level)) {
    throw new UsageError(`${flag} expects one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

function parseParse(args: string[]): CliCommand {
  let file: string | undefined;
  let response = false;
  for (const arg of args) {
    if (arg === "--response" || arg === "-r") {
      response = true;
    } else if (arg === "-" || !arg.startsWith("-")) {
      if (file !== undefined) throw new UsageError("Only one input file");
      file = arg;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }
  return { command: "parse", file, response };
}

function parseServe(args: string[]): CliCommand {
  let port = 8080;
  let host = "127.0.0.1";
  let quiet = false;
  let timeoutMs = DEFAULT_TIMEOUT_MS;
  let logLevel: LogLevel = "info";

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--port" || arg === "-p") {
      port = parseInteger(args[++i], arg);
    } else if (arg === "--host" || arg === "-H") {
      host = requireValue(args[++i], arg);
    } else if (arg === "--quiet" || arg === "-q") {
      quiet = true;
    } else if (arg === "--timeout" || arg === "-t") {
      timeoutMs = parseInteger(args[++i], arg);
    } else if (arg === "--log-level") {
      logLevel = parseLogLevel(args[++i], arg);
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return { command: "serve", port, host, quiet, timeoutMs, logLevel };
}

function parseRequest(args: string[]): CliCommand {
  let target: string | undefined;
  let path = "/";
  let method: HttpMethod = "GET";
  const headers: Record<string, string> = {};
  let data: string | undefined;
  let timeoutMs = DEFAULT_TIMEOUT_MS;
  let positional = 0;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--method" || arg === "-X") {
      const value = requireValue(args[++i], arg);
      if (!isHttpMethod(value)) {
        throw new UsageError(`Unsupported method: ${value}`);
      }
      method = value;
    } else if (arg === "--header") {
      const value = requireValue(args[++i], arg);
      const colon = value.indexOf(":");
      if (colon <= 0) {
        throw new UsageError(`Header must look like "Name: value": ${value}`);
      }
      headers[value.slice(0, colon).trim()] = value.slice(colon + 1).trim();
    } else if (arg === "--data" || arg === "-d") {
      data = requireValue(args[++i], arg);
    } else if (arg === "--timeout" || arg === "-t") {
      timeoutMs = parseInteger(args[++i], arg);
    } else if (!arg.startsWith("-")) {
      if (positional === 0) target = arg;
      else if (positional === 1) path = arg;
      else throw new UsageError(`Unexpected argument: ${arg}`);
      positional++;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  if (target === undefined) {
    throw new UsageError("request needs <host:port>");
  }

  return {
    command: "request",
    ...parseTarget(target),
    path,
    method,
    headers,
    data,
    timeoutMs,
  };
}

export function parseArgs(args: string[]): CliCommand {
  const [command, ...rest] = args;
  switch (command) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { command: "help" };
    case "parse":
      return parseParse(rest);
    case "serve":
      return parseServe(rest);
    case "request":
      return parseRequest(rest);
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

export const HELP_TEXT = `
httptok - tokenize HTTP/1.x messages

Usage:
  httptok parse [file] [--response]     Parse a raw message from a file or stdin
  httptok serve [options]               Answer each request with what was parsed
  httptok request <host:port> [path]    Send one request and parse the response

Serve options:
  --port, -p <port>      Port to listen on (default: 8080)
  --host, -H <host>      Host to bind (default: 127.0.0.1)
  --quiet, -q            Suppress request logging
  --timeout, -t <ms>     Max wait for each request byte (default: 5000)
  --log-level <level>    debug, info, warn or error (default: info)

Request options:
  --method, -X <method>  Request method (default: GET)
  --header "Name: value" Add a request header (repeatable)
  --data, -d <text>      Request body
  --timeout, -t <ms>     Max wait for each response byte (default: 5000)
`;
