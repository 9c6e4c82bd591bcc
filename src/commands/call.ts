/**
 * `room call <method> [key=value...]` — Send one call, print its result, exit.
 */
import chalk from "chalk";
import { SignalingClient } from "../sdk/client.js";
import { createLogger } from "../sdk/logger.js";
import { toError } from "../sdk/errors.js";
import { formatResult } from "../lib/formatting.js";
import { parseParamPairs } from "../lib/parsers.js";
import { createTrafficStore, formatTrafficEntry } from "../state/traffic.js";

export async function runCall(
  method: string,
  pairs: readonly string[],
  opts: { url: string; timeoutMs: number; debug: boolean },
): Promise<void> {
  const traffic = opts.debug ? createTrafficStore() : null;
  const log = createLogger("cli");
  const client = new SignalingClient({
    url: opts.url,
    logger: log,
    observer: traffic?.getState().observer(),
    sink: {
      onResponse: () => {},
      onNotification: (name, params) => {
        console.error(chalk.dim(`${name} ${JSON.stringify(params)}`));
      },
      onConnectionClosed: () => {},
      onError: (error) => {
        console.error(chalk.red(error.message));
      },
    },
  });

  try {
    const params = pairs.length > 0 ? parseParamPairs(pairs) : undefined;
    const signal = AbortSignal.timeout(opts.timeoutMs);
    client.connect();
    await client.whenConnected(signal);
    const result = await client.call(method, params, { signal });
    console.log(formatResult(result));
  } catch (err) {
    process.stderr.write(toError(err).message + "\n");
    process.exitCode = 1;
  } finally {
    client.close();
    await client.idle();
    if (traffic) {
      for (const entry of traffic.getState().entries) {
        console.error(chalk.dim(formatTrafficEntry(entry)));
      }
    }
  }
}
