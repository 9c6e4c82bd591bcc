/**
 * `room join <room> --user <name>` — Join a room and print what happens in
 * it until interrupted, then leave.
 */
import chalk from "chalk";
import { RoomClient } from "../room/room-client.js";
import type { RoomListener } from "../room/types.js";
import { formatRoomEvent } from "../lib/formatting.js";
import { createTrafficStore, formatTrafficEntry } from "../state/traffic.js";
import { createLogger } from "../sdk/logger.js";
import { toError } from "../sdk/errors.js";

const JOIN_ID = 1;
const LEAVE_ID = 2;

export async function runJoin(opts: {
  url: string;
  room: string;
  user: string;
  timeoutMs: number;
  debug: boolean;
}): Promise<void> {
  const traffic = opts.debug ? createTrafficStore() : null;
  let finish: (() => void) | undefined;
  const done = new Promise<void>((resolve) => {
    finish = resolve;
  });

  const listener: RoomListener = {
    onRoomConnected: () => {
      console.log(chalk.dim(`connected to ${opts.url}`));
    },
    onRoomResponse: (response) => {
      if (response.id === JOIN_ID) {
        console.log(chalk.green(`joined ${opts.room} as ${opts.user}`));
        const peers = response.get("value");
        if (Array.isArray(peers) && peers.length > 0) {
          console.log(chalk.dim(`${peers.length} other participant(s) present`));
        }
      } else if (response.id === LEAVE_ID) {
        console.log(chalk.dim(`left ${opts.room}`));
      }
    },
    onRoomError: (error) => {
      console.error(chalk.red(`call #${error.id} failed: ${error.message}`));
      if (error.id === JOIN_ID) {
        process.exitCode = 1;
        finish?.();
      }
    },
    onRoomNotification: (notification) => {
      console.log(formatRoomEvent(notification.event));
      if (notification.event.type === "participantEvicted") finish?.();
      if (notification.event.type === "roomClosed") finish?.();
    },
    onRoomDisconnected: (code, reason, remote) => {
      if (remote) {
        console.error(chalk.yellow(`server closed the connection (${code}${reason ? `: ${reason}` : ""})`));
      }
      finish?.();
    },
    onRoomFailure: (error) => {
      console.error(chalk.red(error.message));
      process.exitCode = 1;
    },
  };

  const room = new RoomClient({
    url: opts.url,
    listener,
    logger: createLogger("cli"),
    observer: traffic?.getState().observer(),
  });
  const onSigint = () => finish?.();
  process.once("SIGINT", onSigint);

  try {
    room.connect();
    await room.whenConnected(AbortSignal.timeout(opts.timeoutMs));
    room.sendJoinRoom(opts.user, opts.room, JOIN_ID);
    await done;
    if (room.isConnected()) {
      room.sendLeaveRoom(LEAVE_ID);
      await room.flush();
    }
  } catch (err) {
    process.stderr.write(toError(err).message + "\n");
    process.exitCode = 1;
  } finally {
    process.removeListener("SIGINT", onSigint);
    room.close();
    await room.flush();
    if (traffic) {
      for (const entry of traffic.getState().entries) {
        console.error(chalk.dim(formatTrafficEntry(entry)));
      }
    }
  }
}
