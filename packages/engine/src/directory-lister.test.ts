import { FsError } from "../../core/src/index";
import type { RemoteProviderHandle } from "../../core/src/index";
import { DirectoryLister } from "./directory-lister";
import { RemoteProvider } from "./providers/remote-provider";
import { MemorySftpSession } from "./test-support/memory-sftp-session";

const assertEqual = <T>(actual: T, expected: T, message: string): void => {
  if (actual !== expected) {
    throw new Error(`${message}: expected "${String(expected)}", got "${String(actual)}"`);
  }
};

const handle: RemoteProviderHandle = {
  id: "sftp-lister",
  kind: "remote",
  params: {
    host: "files.example.test",
    port: 22,
    username: "tester",
    credentialRef: "test-cred",
    initialPath: "/"
  }
};

const session = new MemorySftpSession();
session.readdirBatchSize = 3;
for (const name of ["one", "two", "three", "four", "five"]) {
  session.putFile(`/docs/${name}.md`, name);
}
const provider = new RemoteProvider(handle, async () => session, 1);
const lister = new DirectoryLister((handleId) => {
  if (handleId !== handle.id) {
    throw FsError.connectivity(`Not connected: ${handleId}`);
  }
  return provider;
}, 2);

await (async () => {
  const listing = lister.list(handle.id, "/docs");
  assertEqual(listing.path, "/docs", "listing path");
  assertEqual(session.calls.length, 0, "creating a listing should not touch the session");

  const pages: number[] = [];
  for await (const page of listing.pages()) {
    pages.push(page.length);
  }
  assertEqual(pages.join(","), "2,2,1", "default page size should apply");

  const names = (await listing.collect()).map((entry) => entry.name);
  assertEqual(names.join(","), "five.md,four.md,one.md,three.md,two.md", "provider order should be kept");

  session.putFile("/docs/six.md", "six");
  assertEqual((await listing.collect()).length, 6, "a listing should re-list on every iteration");

  const sized = lister.list(handle.id, "/docs", { pageSize: 4 });
  const sizedPages: number[] = [];
  for await (const page of sized.pages()) {
    sizedPages.push(page.length);
  }
  assertEqual(sizedPages.join(","), "4,2", "explicit page size should apply");
})();

await (async () => {
  let seen = 0;
  for await (const entry of lister.list(handle.id, "/docs")) {
    seen += entry.size > 0 ? 1 : 0;
    break;
  }
  assertEqual(seen, 1, "iteration can stop early");
  assertEqual(session.openHandleCount, 0, "stopping early should close the directory handle");
})();

await (async () => {
  const listing = lister.list("sftp-gone", "/docs");
  try {
    await listing.collect();
    throw new Error("listing an unknown handle should fail");
  } catch (error) {
    assertEqual(error instanceof FsError && error.code, "ConnectivityError", "unknown handle");
  }
})();
