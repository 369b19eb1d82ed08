import * as fs from "node:fs/promises";
import {
  BufferByteSource,
  basicLogger,
  concat,
  createNodeServer,
  defaultConfig,
  describeRequest,
  describeResponse,
  exchange,
  filteredLogger,
  fromString,
  NodeSocketFactory,
  prefixedLogger,
  readRequest,
  readResponse,
} from "@httptok/engine";
import { type CliCommand, HELP_TEXT, parseArgs } from "./args.js";

async function readInput(file?: string): Promise<Uint8Array> {
  if (file !== undefined && file !== "-") {
    return new Uint8Array(await fs.readFile(file));
  }
  const chunks: Uint8Array[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? fromString(chunk) : new Uint8Array(chunk));
  }
  return concat(chunks);
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

async function runParse(
  command: Extract<CliCommand, { command: "parse" }>,
): Promise<void> {
  const source = new BufferByteSource(await readInput(command.file));
  if (command.response) {
    printJson(describeResponse(await readResponse(source)));
  } else {
    printJson(describeRequest(await readRequest(source)));
  }
  if (source.remaining > 0) {
    console.error(`${source.remaining} trailing byte(s) left unparsed`);
  }
}

async function runServe(
  command: Extract<CliCommand, { command: "serve" }>,
): Promise<void> {
  const logger = filteredLogger(
    command.logLevel,
    prefixedLogger("httptok", basicLogger()),
  );
  const config = {
    ...defaultConfig(),
    port: command.port,
    host: command.host,
    quiet: command.quiet,
    idleTimeoutMs: command.timeoutMs,
  };

  const server = createNodeServer({ config, logger });
  const port = await server.start();

  console.log(`\n  httptok inspecting requests\n`);
  console.log(`  Local:   http://${config.host}:${port}\n`);

  const shutdown = () => {
    console.log("\nShutting down...");
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("Shutdown failed:", err);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

/** User headers win; Host is added only when none of them is a Host header. */
export function requestHeaders(
  command: Extract<CliCommand, { command: "request" }>,
): Record<string, string> {
  const hasHost = Object.keys(command.headers).some(
    (name) => name.toLowerCase() === "host",
  );
  if (hasHost) {
    return { ...command.headers };
  }
  return { Host: `${command.host}:${command.port}`, ...command.headers };
}

async function runRequest(
  command: Extract<CliCommand, { command: "request" }>,
): Promise<void> {
  const socket = await new NodeSocketFactory().connect({
    host: command.host,
    port: command.port,
  });

  try {
    const response = await exchange(
      socket,
      {
        method: command.method,
        resource: command.path,
        headers: requestHeaders(command),
        body: command.data === undefined ? undefined : fromString(command.data),
      },
      { idleTimeoutMs: command.timeoutMs },
    );
    printJson(describeResponse(response));
  } finally {
    socket.close();
  }
}

export async function runCli(argv: string[]): Promise<void> {
  const command = parseArgs(argv);

  switch (command.command) {
    case "help":
      console.log(HELP_TEXT);
      return;
    case "parse":
      return runParse(command);
    case "serve":
      return runServe(command);
    case "request":
      return runRequest(command);
  }
}
