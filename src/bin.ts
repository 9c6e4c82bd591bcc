#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { parseTimeoutMs } from "./lib/parsers.js";

const DEFAULT_URL = process.env["SIGNALING_URL"] ?? "ws://localhost:8443/room";
const DEFAULT_TIMEOUT_MS = 10_000;

// --- Parse CLI args ---

const argv = await yargs(hideBin(process.argv))
  .scriptName("room")
  .usage("Usage: $0 <command> [options]")
  .option("url", {
    type: "string",
    default: DEFAULT_URL,
    describe: "Room server endpoint (ws: or wss:)",
  })
  .option("timeout", {
    type: "number",
    describe: "Milliseconds to wait for the connection and replies",
  })
  .option("debug", {
    type: "boolean",
    default: false,
    describe: "Print the RPC traffic log on exit",
  })
  .option("log-level", {
    type: "string",
    choices: ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const,
    describe: "Log level for diagnostics on stderr",
  })
  .command("join <room>", "Join a room and follow its events until Ctrl-C", (y) =>
    y
      .positional("room", {
        type: "string",
        describe: "Room name",
        demandOption: true,
      })
      .option("user", {
        alias: "u",
        type: "string",
        default: process.env["USER"] ?? "guest",
        describe: "Participant name",
      }),
  )
  .command("call <method> [params..]", "Send one call and print its result", (y) =>
    y
      .positional("method", {
        type: "string",
        describe: "Method name",
        demandOption: true,
      })
      .positional("params", {
        type: "string",
        array: true,
        default: [],
        describe: "Named params as key=value",
      }),
  )
  .demandCommand(1)
  .strict()
  .help()
  .parse();

if (argv.logLevel) process.env["SIGNALING_LOG_LEVEL"] = argv.logLevel;

// --- Route to subcommands ---

const command = String(argv._[0]);

try {
  const timeoutMs = parseTimeoutMs(argv.timeout, DEFAULT_TIMEOUT_MS);

  if (command === "join") {
    const { runJoin } = await import("./commands/join.js");
    await runJoin({
      url: argv.url,
      room: String(argv.room),
      user: String(argv.user),
      timeoutMs,
      debug: argv.debug,
    });
  } else if (command === "call") {
    const { runCall } = await import("./commands/call.js");
    const params = Array.isArray(argv.params) ? argv.params.map(String) : [];
    await runCall(String(argv.method), params, { url: argv.url, timeoutMs, debug: argv.debug });
  }
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}
