import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { DEFAULT_ENGINE_SETTINGS, FsError, LOCAL_HANDLE_ID } from "../../../core/src/index";
import type {
  OperationKind,
  OperationOptions,
  OperationRequest,
  OperationResult,
  ProviderPath,
  RemoteProviderHandle
} from "../../../core/src/index";
import type { EngineEvent, ProgressEvent } from "../../../shared/src/index";
import { InMemoryEventBus } from "../event-bus";
import { silentLogger } from "../logger";
import { LocalProvider } from "../providers/local-provider";
import type { FilesystemProvider } from "../providers/provider";
import { RemoteProvider } from "../providers/remote-provider";
import { MemorySftpSession } from "../test-support/memory-sftp-session";
import { ConflictArbiter } from "./conflict-arbiter";
import { TransferEngine } from "./transfer-engine";

const assertEqual = <T>(actual: T, expected: T, message: string): void => {
  if (actual !== expected) {
    throw new Error(`${message}: expected "${String(expected)}", got "${String(actual)}"`);
  }
};

const flushEvents = async (): Promise<void> => {
  await new Promise<void>((resolve) => setImmediate(resolve));
  await new Promise<void>((resolve) => setImmediate(resolve));
};

const exists = async (target: string): Promise<boolean> => {
  try {
    await fs.lstat(target);
    return true;
  } catch {
    return false;
  }
};

const remoteHandle: RemoteProviderHandle = {
  id: "sftp-transfer",
  kind: "remote",
  params: {
    host: "files.example.test",
    port: 22,
    username: "tester",
    credentialRef: "test-cred",
    initialPath: "/"
  }
};

const local = (target: string): ProviderPath => ({ handleId: LOCAL_HANDLE_ID, path: target });
const remote = (target: string): ProviderPath => ({ handleId: remoteHandle.id, path: target });

const request = (
  kind: OperationKind,
  sources: ProviderPath[],
  destination: ProviderPath,
  options: Partial<OperationOptions> = {}
): OperationRequest => ({
  kind,
  sources,
  destination,
  options: {
    overwritePolicy: "skip",
    recursive: false,
    preserveTimestamps: false,
    abortOnFirstError: false,
    ...options
  }
});

interface Harness {
  session: MemorySftpSession;
  events: InMemoryEventBus;
  arbiter: ConflictArbiter;
  received: EngineEvent[];
  run: (operation: OperationRequest, cancellation?: AbortSignal) => Promise<OperationResult>;
}

let requestCounter = 0;

const createHarness = (): Harness => {
  const session = new MemorySftpSession();
  const localProvider = new LocalProvider(4);
  const remoteProvider = new RemoteProvider(remoteHandle, async () => session, 1);
  const providers = (handleId: string): FilesystemProvider => {
    if (handleId === LOCAL_HANDLE_ID) {
      return localProvider;
    }
    if (handleId === remoteHandle.id) {
      return remoteProvider;
    }
    throw FsError.connectivity(`Not connected: ${handleId}`);
  };

  const events = new InMemoryEventBus(silentLogger);
  const received: EngineEvent[] = [];
  events.subscribe((event) => {
    received.push(event);
  });
  const arbiter = new ConflictArbiter(events);
  const engine = new TransferEngine({
    providers,
    events,
    arbiter,
    logger: silentLogger,
    settings: { ...DEFAULT_ENGINE_SETTINGS, chunkSizeBytes: 1024 },
    sleep: async () => undefined
  });

  return {
    session,
    events,
    arbiter,
    received,
    run: async (operation, cancellation = new AbortController().signal) => {
      requestCounter += 1;
      return engine.execute(`request-${requestCounter}`, operation, cancellation);
    }
  };
};

const pattern = (length: number): Buffer => Buffer.from(Array.from({ length }, (_value, index) => (index * 31) % 256));

const root = await fs.mkdtemp(path.join(os.tmpdir(), "duopane-transfer-"));

try {
  // recursive copy of a directory tree to the remote side, then again under skip
  await (async () => {
    const harness = createHarness();
    const source = path.join(root, "a");
    await fs.mkdir(path.join(source, "b"), { recursive: true });
    await fs.writeFile(path.join(source, "x.txt"), pattern(100));
    await fs.writeFile(path.join(source, "b", "y.txt"), pattern(50));

    const copy = request("copy", [local(source)], remote("/dst"), { recursive: true, overwritePolicy: "overwrite" });
    const first = await harness.run(copy);
    assertEqual(first.status, "completed", "copy status");
    assertEqual(first.summary.succeeded, 2, "both files should be copied");
    assertEqual(first.bytesTransferred, 150, "bytes transferred");
    assertEqual(first.items[0]?.sourcePath, path.join(source, "b", "y.txt"), "items are expanded depth-first by name");
    assertEqual(first.items[0]?.destinationPath, "/dst/a/b/y.txt", "descendants keep their relative layout");
    assertEqual(harness.session.readFile("/dst/a/x.txt")?.equals(pattern(100)), true, "x.txt content");
    assertEqual(harness.session.readFile("/dst/a/b/y.txt")?.equals(pattern(50)), true, "y.txt content");
    assertEqual(Object.isFrozen(first), true, "results should be immutable");

    const second = await harness.run({ ...copy, options: { ...copy.options, overwritePolicy: "skip" } });
    assertEqual(second.status, "completed", "second copy status");
    assertEqual(second.bytesTransferred, 0, "skip should transfer nothing");
    assertEqual(second.summary.skipped, 2, "every item should be skipped");
    assertEqual(second.items[1]?.error?.code, "NameCollision", "skip reason");
  })();

  // byte-exact multi-chunk copy with progress and preserved timestamps
  await (async () => {
    const harness = createHarness();
    const source = path.join(root, "big.bin");
    await fs.writeFile(source, pattern(3000));
    await fs.utimes(source, 1_600_000_000, 1_600_000_000);

    const result = await harness.run(request("copy", [local(source)], remote("/in"), { preserveTimestamps: true }));
    await flushEvents();

    assertEqual(result.items[0]?.status, "succeeded", "item status");
    assertEqual(result.items[0]?.bytes, 3000, "item bytes");
    assertEqual(harness.session.readFile("/in/big.bin")?.equals(pattern(3000)), true, "content should be byte-exact");
    assertEqual(harness.session.modifiedAt("/in/big.bin"), 1_600_000_000, "modification time should be preserved");

    const progress = harness.received.filter((event): event is ProgressEvent => event.type === "progress");
    assertEqual(progress.map((event) => event.bytesSoFar).join(","), "1024,2048,3000", "one progress event per chunk");
    assertEqual(progress[2]?.bytesTotal, 3000, "item total");
    assertEqual(progress[2]?.requestBytesTotal, 3000, "request total");
    assertEqual(progress[2]?.requestBytesSoFar, 3000, "request progress");

    const itemEvents = harness.received.filter((event) => event.type === "item");
    assertEqual(itemEvents.length, 1, "one item event per item");
  })();

  // cancellation mid-file removes the partial destination
  await (async () => {
    const harness = createHarness();
    harness.session.putFile("/remote/huge.bin", pattern(10_240));
    const controller = new AbortController();
    let reads = 0;
    harness.session.fault = (operation) => {
      if (operation === "read") {
        reads += 1;
        if (reads === 3) {
          controller.abort();
        }
      }
      return undefined;
    };

    const destination = path.join(root, "cancel");
    const result = await harness.run(
      request("copy", [remote("/remote/huge.bin")], local(destination)),
      controller.signal
    );

    assertEqual(result.status, "cancelled", "result status");
    assertEqual(result.items[0]?.status, "cancelled", "item status");
    assertEqual(result.bytesTransferred, 0, "cancelled items transfer nothing");
    assertEqual(await exists(path.join(destination, "huge.bin")), false, "partial destination should be removed");
    assertEqual(harness.session.openHandleCount, 0, "source handle should be closed");
  })();

  // connectivity failures are retried per item
  await (async () => {
    const harness = createHarness();
    harness.session.putFile("/remote/flaky.bin", pattern(2500));
    let reads = 0;
    harness.session.fault = (operation) => {
      if (operation !== "read") {
        return undefined;
      }
      reads += 1;
      return reads <= 2 ? new Error("Connection lost") : undefined;
    };

    const destination = path.join(root, "retry");
    const result = await harness.run(request("copy", [remote("/remote/flaky.bin")], local(destination)));
    assertEqual(result.items[0]?.status, "succeeded", "item should succeed after retries");
    assertEqual(result.bytesTransferred, 2500, "bytes of the successful attempt");
    assertEqual((await fs.readFile(path.join(destination, "flaky.bin"))).equals(pattern(2500)), true, "content");
  })();

  // a failed move keeps its source
  await (async () => {
    const harness = createHarness();
    harness.session.putFile("/remote/keep.txt", "keep me");
    harness.session.fault = (operation) => (operation === "read" ? Object.assign(new Error("Failure"), { code: 4 }) : undefined);

    const destination = path.join(root, "move-failed");
    const result = await harness.run(request("move", [remote("/remote/keep.txt")], local(destination)));
    assertEqual(result.status, "completed", "batch status");
    assertEqual(result.items[0]?.status, "failed", "item status");
    assertEqual(result.items[0]?.error?.code, "UnknownFailure", "item error");
    assertEqual(harness.session.readFile("/remote/keep.txt")?.toString(), "keep me", "source should be kept");
    assertEqual(await exists(path.join(destination, "keep.txt")), false, "no destination file");
  })();

  // cross-provider move deletes the source tree after every file succeeded
  await (async () => {
    const harness = createHarness();
    harness.session.putFile("/outbox/report/q1.txt", "q1");
    harness.session.putFile("/outbox/report/q2.txt", "q2");
    harness.session.putDirectory("/outbox/report/empty");

    const destination = path.join(root, "inbox");
    const result = await harness.run(
      request("move", [remote("/outbox/report")], local(destination), { recursive: true })
    );
    assertEqual(result.summary.succeeded, 3, "every item should move");
    assertEqual(harness.session.has("/outbox/report"), false, "moved directory should be removed");
    assertEqual(await fs.readFile(path.join(destination, "report", "q2.txt"), "utf8"), "q2", "moved content");
    assertEqual((await fs.stat(path.join(destination, "report", "empty"))).isDirectory(), true, "empty directory");
  })();

  // same-provider move is a rename; a directory cannot move into itself
  await (async () => {
    const harness = createHarness();
    const source = path.join(root, "local-move", "d");
    await fs.mkdir(path.join(source, "inner"), { recursive: true });
    await fs.writeFile(path.join(source, "f.txt"), "f");

    const into = await harness.run(request("move", [local(source)], local(path.join(source, "inner")), { recursive: true }));
    assertEqual(into.items[0]?.error?.code, "InvalidOperation", "move into itself");

    const target = path.join(root, "local-move", "target");
    const moved = await harness.run(request("move", [local(source)], local(target), { recursive: true }));
    assertEqual(moved.items.length, 1, "a same-provider move should be a single item");
    assertEqual(moved.items[0]?.kind, "directory", "moved item kind");
    assertEqual(moved.items[0]?.destinationPath, path.join(target, "d"), "moved item destination");
    assertEqual(await exists(source), false, "source should be gone");
    assertEqual(await fs.readFile(path.join(target, "d", "f.txt"), "utf8"), "f", "moved content");
  })();

  // two same-named sources moved into one directory never replace each other
  await (async () => {
    const harness = createHarness();
    const base = path.join(root, "same-name");
    for (const dir of ["a", "b", "c", "d"]) {
      await fs.mkdir(path.join(base, dir), { recursive: true });
      await fs.writeFile(path.join(base, dir, "x.txt"), `from-${dir}`);
    }
    const dest = path.join(base, "dest");

    const skipped = await harness.run(
      request("move", [local(path.join(base, "a", "x.txt")), local(path.join(base, "b", "x.txt"))], local(dest))
    );
    assertEqual(skipped.items[0]?.status, "succeeded", "first source is renamed");
    assertEqual(skipped.items[1]?.status, "skipped", "second source collides with the first");
    assertEqual(skipped.items[1]?.error?.code, "NameCollision", "collision reason");
    assertEqual(await fs.readFile(path.join(dest, "x.txt"), "utf8"), "from-a", "first source content kept");
    assertEqual(await fs.readFile(path.join(base, "b", "x.txt"), "utf8"), "from-b", "skipped source stays");

    const suffixed = await harness.run(
      request(
        "move",
        [local(path.join(base, "c", "x.txt")), local(path.join(base, "d", "x.txt"))],
        local(path.join(base, "dest2")),
        { overwritePolicy: "rename-with-suffix" }
      )
    );
    assertEqual(suffixed.summary.succeeded, 2, "both sources move");
    assertEqual(suffixed.items[1]?.destinationPath, path.join(base, "dest2", "x (1).txt"), "second source is suffixed");
    assertEqual(await fs.readFile(path.join(base, "dest2", "x.txt"), "utf8"), "from-c", "renamed content");
    assertEqual(await fs.readFile(path.join(base, "dest2", "x (1).txt"), "utf8"), "from-d", "suffixed content");
    assertEqual(await exists(path.join(base, "d", "x.txt")), false, "moved source is removed");
  })();

  // collisions resolved with a suffix
  await (async () => {
    const harness = createHarness();
    harness.session.putFile("/shared/report.txt", "existing");
    const source = path.join(root, "suffix", "report.txt");
    await fs.mkdir(path.dirname(source), { recursive: true });
    await fs.writeFile(source, "incoming");

    const result = await harness.run(
      request("copy", [local(source)], remote("/shared"), { overwritePolicy: "rename-with-suffix" })
    );
    assertEqual(result.items[0]?.destinationPath, "/shared/report (1).txt", "suffixed destination");
    assertEqual(harness.session.readFile("/shared/report.txt")?.toString(), "existing", "existing file untouched");
    assertEqual(harness.session.readFile("/shared/report (1).txt")?.toString(), "incoming", "suffixed content");
  })();

  // prompted collisions, answered once for the whole request
  await (async () => {
    const harness = createHarness();
    harness.session.putFile("/prompt/a.txt", "old a");
    harness.session.putFile("/prompt/b.txt", "old b");
    const sourceDir = path.join(root, "prompt");
    await fs.mkdir(sourceDir, { recursive: true });
    await fs.writeFile(path.join(sourceDir, "a.txt"), "new a");
    await fs.writeFile(path.join(sourceDir, "b.txt"), "new b");

    let prompts = 0;
    harness.events.subscribe((event) => {
      if (event.type === "conflict") {
        prompts += 1;
        harness.arbiter.resolve(event.decisionId, { action: "overwrite", applyToAll: true });
      }
    });

    const result = await harness.run(
      request(
        "copy",
        [local(path.join(sourceDir, "a.txt")), local(path.join(sourceDir, "b.txt"))],
        remote("/prompt"),
        { overwritePolicy: "prompt" }
      )
    );
    assertEqual(prompts, 1, "apply-to-all should answer later collisions");
    assertEqual(result.summary.succeeded, 2, "both files should be overwritten");
    assertEqual(harness.session.readFile("/prompt/b.txt")?.toString(), "new b", "overwritten content");
    assertEqual(harness.arbiter.pendingCount, 0, "no decision should be left waiting");
  })();

  // a declined collision fails its item only
  await (async () => {
    const harness = createHarness();
    harness.session.putFile("/decline/a.txt", "old");
    const source = path.join(root, "decline", "a.txt");
    await fs.mkdir(path.dirname(source), { recursive: true });
    await fs.writeFile(source, "new");

    harness.events.subscribe((event) => {
      if (event.type === "conflict") {
        harness.arbiter.resolve(event.decisionId, { action: "decline", applyToAll: false });
      }
    });

    const result = await harness.run(request("copy", [local(source)], remote("/decline"), { overwritePolicy: "prompt" }));
    assertEqual(result.items[0]?.status, "failed", "declined item status");
    assertEqual(result.items[0]?.error?.code, "NameCollision", "declined item error");
    assertEqual(harness.session.readFile("/decline/a.txt")?.toString(), "old", "existing file untouched");
  })();

  // directories need recursive; abort-on-first-error cancels the rest
  await (async () => {
    const harness = createHarness();
    const dir = path.join(root, "plain-dir");
    const file = path.join(root, "plain.txt");
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(file, "plain");

    const skipped = await harness.run(request("copy", [local(dir), local(file)], remote("/plain")));
    assertEqual(skipped.items[0]?.status, "skipped", "directory without recursive");
    assertEqual(skipped.items[0]?.error?.code, "SkippedDirectory", "skip reason");
    assertEqual(skipped.items[1]?.status, "succeeded", "the file is still copied");

    const aborted = await harness.run(
      request("copy", [local(path.join(root, "nope.txt")), local(file)], remote("/aborted"), { abortOnFirstError: true })
    );
    assertEqual(aborted.status, "failed", "aborted result status");
    assertEqual(aborted.items[0]?.error?.code, "NotFound", "first failure");
    assertEqual(aborted.items[1]?.status, "cancelled", "remaining items are cancelled");
    assertEqual(harness.session.has("/aborted/plain.txt"), false, "cancelled items are not copied");
  })();

  // an unknown destination handle fails every source
  await (async () => {
    const harness = createHarness();
    const result = await harness.run(request("copy", [local(root)], { handleId: "sftp-gone", path: "/" }));
    assertEqual(result.status, "failed", "result status");
    assertEqual(result.items[0]?.error?.code, "ConnectivityError", "item error");
  })();
} finally {
  await fs.rm(root, { recursive: true, force: true });
}
