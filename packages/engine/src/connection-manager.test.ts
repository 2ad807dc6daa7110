import { DEFAULT_ENGINE_SETTINGS, FsError } from "../../core/src/index";
import type { ConnectionState, EngineSettings, FsErrorCode, RemoteConnectionParams } from "../../core/src/index";
import type { SftpSession, SshConnectOptions } from "../../ssh/src/index";
import { ConnectionManager, InMemoryCredentialResolver } from "./connection-manager";
import type { SessionFactory } from "./connection-manager";
import { InMemoryEventBus } from "./event-bus";
import { silentLogger } from "./logger";
import { MemorySftpSession } from "./test-support/memory-sftp-session";

const assertEqual = <T>(actual: T, expected: T, message: string): void => {
  if (actual !== expected) {
    throw new Error(`${message}: expected "${String(expected)}", got "${String(actual)}"`);
  }
};

const expectFsError = async (work: Promise<unknown>, code: FsErrorCode, message: string): Promise<FsError> => {
  try {
    await work;
  } catch (error) {
    if (!(error instanceof FsError)) {
      throw new Error(`${message}: expected FsError, got ${String(error)}`);
    }
    assertEqual(error.code, code, message);
    return error;
  }
  throw new Error(`${message}: expected ${code}, but it resolved`);
};

const flushEvents = async (): Promise<void> => {
  await new Promise<void>((resolve) => setImmediate(resolve));
  await new Promise<void>((resolve) => setImmediate(resolve));
};

const waitUntil = async (check: () => boolean, label: string, timeoutMs = 2000): Promise<void> => {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) {
      throw new Error(`timed out waiting for ${label}`);
    }
    await new Promise<void>((resolve) => setTimeout(resolve, 5));
  }
};

const params: RemoteConnectionParams = {
  host: "files.example.test",
  port: 22,
  username: "tester",
  credentialRef: "test-cred",
  initialPath: "/"
};

const refused = (): Error => Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });

interface Harness {
  manager: ConnectionManager;
  states: ConnectionState[];
  delays: number[];
  calls: SshConnectOptions[];
}

/** `steps` answers the factory calls in order; a missing step refuses the connection. */
const createHarness = (
  steps: Array<() => Promise<SftpSession>>,
  overrides: Partial<EngineSettings> = {}
): Harness => {
  const events = new InMemoryEventBus(silentLogger);
  const states: ConnectionState[] = [];
  events.subscribe((event) => {
    if (event.type === "connectivity") {
      states.push(event.state);
    }
  });

  const delays: number[] = [];
  const calls: SshConnectOptions[] = [];
  const sessionFactory: SessionFactory = async (options) => {
    calls.push(options);
    const step = steps[calls.length - 1];
    if (!step) {
      throw refused();
    }
    return step();
  };

  const manager = new ConnectionManager({
    settings: { ...DEFAULT_ENGINE_SETTINGS, heartbeatIntervalMs: 60_000, ...overrides },
    credentials: new InMemoryCredentialResolver({
      "test-cred": { authType: "password", password: "test-secret" }
    }),
    events,
    logger: silentLogger,
    sessionFactory,
    sleep: async (ms) => {
      delays.push(ms);
    }
  });

  return { manager, states, delays, calls };
};

await (async () => {
  const session = new MemorySftpSession();
  const harness = createHarness([
    async () => {
      throw refused();
    },
    async () => {
      throw refused();
    },
    async () => session
  ]);

  const handle = await harness.manager.connect(params);
  await flushEvents();

  assertEqual(handle.kind, "remote", "connect should return a remote handle");
  assertEqual(handle.id.startsWith("sftp-"), true, "remote handle id prefix");
  assertEqual(harness.calls.length, 3, "connectivity failures should be retried");
  assertEqual(harness.delays.join(","), "1000,2000", "retries should back off exponentially");
  assertEqual(harness.calls[0]?.password, "test-secret", "credential should be resolved from its reference");
  assertEqual(harness.states.join(","), "Connecting,Authenticated,Ready", "state sequence");
  assertEqual(harness.manager.state(handle.id), "Ready", "connected state");
  assertEqual(await harness.manager.getSession(handle.id), session, "the live session");

  await harness.manager.disconnect(handle.id);
  assertEqual(session.isClosed, true, "disconnect should close the transport");
  assertEqual(harness.manager.state(handle.id), "Disconnected", "state after disconnect");
  await expectFsError(harness.manager.getSession(handle.id), "ConnectivityError", "session after disconnect");
  assertEqual(harness.manager.getProvider(handle.id), undefined, "provider after disconnect");
})();

await (async () => {
  const harness = createHarness([
    async () => {
      throw FsError.authentication("All configured authentication methods failed");
    }
  ]);

  await expectFsError(harness.manager.connect(params), "AuthenticationError", "authentication failure");
  await flushEvents();
  assertEqual(harness.calls.length, 1, "authentication failures should not be retried");
  assertEqual(harness.states.join(","), "Connecting,Disconnected", "failed connect state sequence");
  assertEqual(harness.manager.handles().length, 0, "failed handles should not be kept");

  await expectFsError(
    harness.manager.connect({ ...params, credentialRef: "unknown" }),
    "AuthenticationError",
    "unknown credential reference"
  );
  assertEqual(harness.calls.length, 1, "an unknown credential should never reach the transport");
})();

await (async () => {
  const harness = createHarness([]);
  await expectFsError(harness.manager.connect(params), "ConnectivityError", "unreachable host");
  assertEqual(harness.calls.length, 3, "every attempt should be used");
})();

await (async () => {
  const harness = createHarness(
    [async () => new Promise<SftpSession>(() => undefined)],
    { connectTimeoutMs: 20, retry: { ...DEFAULT_ENGINE_SETTINGS.retry, attempts: 1 } }
  );
  const error = await expectFsError(harness.manager.connect(params), "ConnectivityError", "connect timeout");
  assertEqual(error.message, "Connect to files.example.test:22 timed out after 20ms", "timeout message");
})();

await (async () => {
  const first = new MemorySftpSession();
  const second = first.reopen();
  const harness = createHarness([async () => first, async () => second]);
  const handle = await harness.manager.connect(params);

  first.drop();
  assertEqual(harness.manager.state(handle.id), "Degraded", "unexpected close should degrade the handle");
  assertEqual(await harness.manager.getSession(handle.id), second, "operations should wait for the reconnect");
  await flushEvents();
  assertEqual(
    harness.states.join(","),
    "Connecting,Authenticated,Ready,Degraded,Ready",
    "reconnect state sequence"
  );
  await harness.manager.disconnectAll();
})();

await (async () => {
  const first = new MemorySftpSession();
  const harness = createHarness([async () => first]);
  const handle = await harness.manager.connect(params);

  first.drop();
  await expectFsError(harness.manager.getSession(handle.id), "ConnectivityError", "failed reconnect");
  assertEqual(harness.manager.state(handle.id), "Disconnected", "failed reconnect should disconnect");
  assertEqual(harness.calls.length, 2, "only one reconnect attempt should be made");
})();

await (async () => {
  const first = new MemorySftpSession();
  first.putDirectory("/data");
  const second = first.reopen();
  const harness = createHarness([async () => first, async () => second]);
  const handle = await harness.manager.connect(params);
  const provider = harness.manager.getProvider(handle.id);
  if (!provider) {
    throw new Error("provider should exist while connected");
  }

  first.fault = (operation) => (operation === "stat" ? new Error("Connection lost") : undefined);
  await expectFsError(provider.stat("/data"), "ConnectivityError", "transport failure during an operation");
  assertEqual((await provider.stat("/data")).kind, "directory", "the provider should use the new session");
  assertEqual(first.isClosed, true, "the stale session should be closed");
  await harness.manager.disconnectAll();
})();

await (async () => {
  const first = new MemorySftpSession();
  const second = first.reopen();
  const harness = createHarness([async () => first, async () => second], {
    heartbeatIntervalMs: 10,
    heartbeatTimeoutMs: 50
  });
  const handle = await harness.manager.connect(params);

  first.fault = (operation) => (operation === "realpath" ? new Error("No response from server") : undefined);
  await waitUntil(() => harness.states.includes("Degraded"), "heartbeat failure");
  await harness.manager.getSession(handle.id);
  assertEqual(harness.manager.state(handle.id), "Ready", "heartbeat failure should lead to a reconnect");
  await harness.manager.disconnectAll();
})();
