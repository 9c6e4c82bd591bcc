/**
 * Test harness: a SignalingClient wired to in-memory transports, with a
 * sink and a diagnostic sink that record everything they receive.
 */
import { SignalingClient } from "../../sdk/client.js";
import type { NotConnectedPolicy, RpcObserver, SignalingSink } from "../../sdk/config.js";
import type { ConnectionState } from "../../sdk/connection.js";
import type { DiagnosticSink, StrayResponse } from "../../sdk/diagnostics.js";
import type { DecodeError, SignalingError } from "../../sdk/errors.js";
import { silentLogger } from "../../sdk/logger.js";
import type { CallOutcome } from "../../sdk/rpc/registry.js";
import type { Call, InboundRequest, JsonObject, JsonValue } from "../../sdk/rpc/types.js";
import {
  createMemoryTransport,
  type MemoryTransport,
  type MemoryTransportOptions,
} from "../../sdk/transport/memory.js";
import type { TransportFactory } from "../../sdk/transport/transport.js";

export const TEST_URL = "ws://room.test/rpc";

export const tick = () => new Promise<void>((r) => setTimeout(r, 0));

/** Records sink callbacks, plus one ordered `log` line per callback. */
export class RecordingSink implements SignalingSink {
  readonly log: string[] = [];
  readonly responses: Array<{ id: number; outcome: CallOutcome }> = [];
  readonly notifications: Array<{ method: string; params: JsonObject }> = [];
  readonly closed: Array<{ code: number; reason: string; remote: boolean }> = [];
  readonly errors: SignalingError[] = [];

  onResponse(id: number, outcome: CallOutcome): void {
    this.log.push(`response:${id}`);
    this.responses.push({ id, outcome });
  }

  onNotification(method: string, params: JsonObject): void {
    this.log.push(`notification:${method}`);
    this.notifications.push({ method, params });
  }

  onConnectionClosed(code: number, reason: string, remote: boolean): void {
    this.log.push(`closed:${code}`);
    this.closed.push({ code, reason, remote });
  }

  onError(error: SignalingError): void {
    this.log.push(`error:${error.code}`);
    this.errors.push(error);
  }
}

/** A recording sink that also takes server requests. */
export class RequestSink extends RecordingSink {
  readonly requests: InboundRequest[] = [];

  onRequest(request: InboundRequest): void {
    this.log.push(`request:${request.method}`);
    this.requests.push(request);
  }
}

export class RecordingDiagnostics implements DiagnosticSink {
  readonly decodeErrors: DecodeError[] = [];
  readonly strays: StrayResponse[] = [];
  readonly dropped: Array<{ call: Call; state: ConnectionState }> = [];
  readonly dispatchErrors: Array<{ label: string; error: Error }> = [];
  readonly transportErrors: Array<{ error: Error; state: ConnectionState }> = [];

  onDecodeError(error: DecodeError): void {
    this.decodeErrors.push(error);
  }

  onStrayResponse(message: StrayResponse): void {
    this.strays.push(message);
  }

  onDroppedSend(call: Call, state: ConnectionState): void {
    this.dropped.push({ call, state });
  }

  onDispatchError(label: string, error: Error): void {
    this.dispatchErrors.push({ label, error });
  }

  onTransportError(error: Error, state: ConnectionState): void {
    this.transportErrors.push({ error, state });
  }
}

/**
 * Factory handing out memory transport pairs. The server side of each
 * pair records what it receives in `inbox`.
 */
export class MemoryServer {
  readonly clients: MemoryTransport[] = [];
  readonly servers: MemoryTransport[] = [];
  /** Raw text received by any server side, in arrival order. */
  readonly inbox: string[] = [];
  readonly factory: TransportFactory;

  constructor(opts: MemoryTransportOptions = {}) {
    this.factory = () => {
      const [client, server] = createMemoryTransport(opts);
      server.onMessage((data) => this.inbox.push(data));
      this.clients.push(client);
      this.servers.push(server);
      return client;
    };
  }

  /** Server side of the most recent connection. */
  get current(): MemoryTransport {
    const server = this.servers.at(-1);
    if (!server) throw new Error("no connection was made");
    return server;
  }

  /** Client side of the most recent connection. */
  get client(): MemoryTransport {
    const client = this.clients.at(-1);
    if (!client) throw new Error("no connection was made");
    return client;
  }

  /** Inbox entries parsed as JSON. */
  received(): JsonValue[] {
    return this.inbox.map((text): JsonValue => JSON.parse(text));
  }

  /** Send a JSON value (or raw text) from the server side. */
  push(message: JsonValue | string): void {
    this.current.send(typeof message === "string" ? message : JSON.stringify(message));
  }
}

export interface Harness {
  client: SignalingClient;
  sink: RecordingSink;
  diagnostics: RecordingDiagnostics;
  server: MemoryServer;
  states: ConnectionState[];
}

export function createHarness(
  opts: {
    transport?: MemoryTransportOptions;
    factory?: TransportFactory;
    notConnected?: NotConnectedPolicy;
    callIdFloor?: number;
    observer?: RpcObserver;
    sink?: RecordingSink;
  } = {},
): Harness {
  const sink = opts.sink ?? new RecordingSink();
  const diagnostics = new RecordingDiagnostics();
  const server = new MemoryServer(opts.transport);
  const client = new SignalingClient({
    url: TEST_URL,
    sink,
    transport: opts.factory ?? server.factory,
    logger: silentLogger(),
    diagnostics,
    observer: opts.observer,
    notConnected: opts.notConnected,
    callIdFloor: opts.callIdFloor,
  });
  const states: ConnectionState[] = [];
  client.onStateChange((state) => states.push(state));
  return { client, sink, diagnostics, server, states };
}

/** A harness whose client has finished connecting. */
export async function connectedHarness(
  opts: Parameters<typeof createHarness>[0] = {},
): Promise<Harness> {
  const harness = createHarness(opts);
  harness.client.connect();
  await tick();
  return harness;
}
