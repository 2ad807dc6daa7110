import {
  engineSettingsSchema,
  operationRequestSchema,
  remoteConnectionSchema,
  sessionRestoreSchema
} from "./contracts";

const assert = (condition: boolean, message: string): void => {
  if (!condition) {
    throw new Error(message);
  }
};

(() => {
  const parsed = operationRequestSchema.safeParse({
    kind: "copy",
    sources: [{ handleId: "local", path: "/a" }],
    destination: { handleId: "conn-1", path: "/srv" }
  });
  assert(parsed.success, "operationRequestSchema should accept a copy with destination");
  if (parsed.success) {
    assert(parsed.data.options.overwritePolicy === "skip", "overwrite policy should default to skip");
    assert(parsed.data.options.recursive === false, "recursive should default to false");
    assert(parsed.data.options.abortOnFirstError === false, "abortOnFirstError should default to false");
  }
})();

(() => {
  const parsed = operationRequestSchema.safeParse({
    kind: "move",
    sources: [{ handleId: "local", path: "/a" }]
  });
  assert(!parsed.success, "operationRequestSchema should reject a move without destination");
})();

(() => {
  const parsed = operationRequestSchema.safeParse({
    kind: "copy",
    sources: [],
    destination: { handleId: "local", path: "/b" }
  });
  assert(!parsed.success, "operationRequestSchema should reject empty sources");
})();

(() => {
  const parsed = operationRequestSchema.safeParse({
    kind: "delete",
    sources: [{ handleId: "local", path: "/a" }],
    destination: { handleId: "local", path: "/b" }
  });
  assert(!parsed.success, "operationRequestSchema should reject a destination on delete");
})();

(() => {
  const crossing = operationRequestSchema.safeParse({
    kind: "rename",
    sources: [{ handleId: "local", path: "/a" }],
    destination: { handleId: "conn-1", path: "/b" }
  });
  assert(!crossing.success, "operationRequestSchema should reject a rename across providers");

  const many = operationRequestSchema.safeParse({
    kind: "rename",
    sources: [
      { handleId: "local", path: "/a" },
      { handleId: "local", path: "/b" }
    ],
    destination: { handleId: "local", path: "/c" }
  });
  assert(!many.success, "operationRequestSchema should reject a rename with several sources");
})();

(() => {
  const parsed = remoteConnectionSchema.safeParse({
    host: " files.example.test ",
    username: " deploy ",
    credentialRef: "cred-1"
  });
  assert(parsed.success, "remoteConnectionSchema should accept minimal params");
  if (parsed.success) {
    assert(parsed.data.port === 22, "port should default to 22");
    assert(parsed.data.host === "files.example.test", "host should be trimmed");
    assert(parsed.data.username === "deploy", "username should be trimmed");
    assert(parsed.data.initialPath === "/", "initial path should default to /");
  }

  const badPort = remoteConnectionSchema.safeParse({
    host: "h",
    port: 70000,
    username: "u",
    credentialRef: "cred-1"
  });
  assert(!badPort.success, "remoteConnectionSchema should reject ports above 65535");

  const noUser = remoteConnectionSchema.safeParse({ host: "h", username: "  ", credentialRef: "cred-1" });
  assert(!noUser.success, "remoteConnectionSchema should reject a blank username");
})();

(() => {
  const parsed = engineSettingsSchema.parse({ chunkSizeBytes: 4096 });
  assert(parsed.chunkSizeBytes === 4096, "engine settings should keep explicit values");
  assert(parsed.retry.attempts === 3, "engine settings should fill retry defaults");
  assert(parsed.heartbeatTimeoutMs === 10000, "engine settings should fill timeout defaults");
  assert(!engineSettingsSchema.safeParse({ workerCount: 0 }).success, "engine settings should reject zero workers");
})();

(() => {
  const parsed = sessionRestoreSchema.safeParse({
    panes: [
      { side: "left", location: { kind: "local", path: "/home/user" } },
      {
        side: "right",
        location: {
          kind: "remote",
          connection: { host: "h", username: "u", credentialRef: "cred-1", initialPath: "/srv" }
        }
      }
    ]
  });
  assert(parsed.success, "sessionRestoreSchema should accept local and remote panes");

  const tooMany = sessionRestoreSchema.safeParse({
    panes: [
      { side: "left", location: { kind: "local", path: "/" } },
      { side: "right", location: { kind: "local", path: "/" } },
      { side: "left", location: { kind: "local", path: "/" } }
    ]
  });
  assert(!tooMany.success, "sessionRestoreSchema should reject more than two panes");
})();
