import type { EngineEvent } from "../../shared/src/index";
import { InMemoryEventBus } from "./event-bus";
import { silentLogger } from "./logger";

const assertEqual = <T>(actual: T, expected: T, message: string): void => {
  if (actual !== expected) {
    throw new Error(`${message}: expected ${String(expected)}, got ${String(actual)}`);
  }
};

const wait = async (ms: number): Promise<void> => {
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
};

const progress = (requestId: string, bytesSoFar: number): EngineEvent => ({
  type: "progress",
  requestId,
  itemIndex: 0,
  itemPath: "/a",
  bytesSoFar,
  bytesTotal: 100,
  requestBytesSoFar: bytesSoFar,
  requestBytesTotal: 100
});

await (async () => {
  const bus = new InMemoryEventBus(silentLogger);
  const seen: number[] = [];
  bus.subscribe((event) => {
    if (event.type === "progress") {
      seen.push(event.bytesSoFar);
    }
  });

  bus.emit(progress("r1", 10));
  bus.emit(progress("r1", 20));
  bus.emit(progress("r1", 30));
  assertEqual(seen.length, 0, "delivery should not happen inside emit");

  await wait(5);
  assertEqual(seen.join(","), "10,20,30", "events of one request should arrive in order");
})();

await (async () => {
  const bus = new InMemoryEventBus(silentLogger);
  const seen: string[] = [];
  bus.subscribe(() => {
    throw new Error("listener bug");
  });
  bus.subscribe((event) => {
    seen.push(event.type);
  });

  bus.emit(progress("r1", 1));
  await wait(5);
  assertEqual(seen.join(","), "progress", "a throwing listener should not block other listeners");
})();

await (async () => {
  const bus = new InMemoryEventBus(silentLogger);
  const seen: string[] = [];
  bus.subscribe(
    (event) => {
      seen.push("requestId" in event ? event.requestId : event.type);
    },
    { requestId: "r2" }
  );

  bus.emit(progress("r1", 1));
  bus.emit(progress("r2", 1));
  bus.emit({ type: "connectivity", handleId: "conn-1", state: "Degraded" });
  await wait(5);
  assertEqual(seen.join(","), "r2", "filter should only pass events of the requested id");
})();

await (async () => {
  const bus = new InMemoryEventBus(silentLogger);
  let count = 0;
  const unsubscribe = bus.subscribe(() => {
    count += 1;
  });
  bus.emit(progress("r1", 1));
  unsubscribe();
  await wait(5);
  assertEqual(count, 0, "unsubscribe should drop queued events");
  assertEqual(bus.subscriberCount, 0, "unsubscribe should remove the listener");
})();
