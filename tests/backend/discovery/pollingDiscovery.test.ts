import { describe, it } from "node:test";
import assert from "node:assert";
import { DiscoveryFilter } from "../../../src/backend/discovery/filters.js";
import { capturingLogger, FakeDevice, FakePollingDiscovery, silentLogger, sleep } from "../../helpers/fakes.js";

async function waitFor(condition: () => boolean, timeoutMs = 1_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error("condition not met in time");
    }
    await sleep(2);
  }
}

describe("PollingDeviceDiscovery", () => {
  it("populates the cache once for concurrent first queries", async () => {
    const backend = new FakePollingDiscovery(silentLogger());
    backend.next = [new FakeDevice({ id: "A" })];
    backend.delayMs = 15;

    const [first, second] = await Promise.all([backend.devices(), backend.devices()]);

    assert.strictEqual(backend.calls, 1);
    assert.deepStrictEqual(first.map((d) => d.id), ["A"]);
    assert.deepStrictEqual(second.map((d) => d.id), ["A"]);
    assert.strictEqual(backend.hasPopulated, true);
    assert.deepStrictEqual(backend.timeouts, [undefined]);
  });

  it("serves later queries from the cache", async () => {
    const backend = new FakePollingDiscovery(silentLogger());
    backend.next = [new FakeDevice({ id: "A" })];
    await backend.devices();
    backend.next = [new FakeDevice({ id: "B" })];

    const devices = await backend.devices();

    assert.strictEqual(backend.calls, 1);
    assert.deepStrictEqual(devices.map((d) => d.id), ["A"]);
  });

  it("applies the filter to cached devices", async () => {
    const backend = new FakePollingDiscovery(silentLogger());
    backend.next = [new FakeDevice({ id: "A", isConnected: false }), new FakeDevice({ id: "B" })];
    const devices = await backend.devices(new DiscoveryFilter());
    assert.deepStrictEqual(devices.map((d) => d.id), ["B"]);
  });

  it("replaces the cache on a scan and reports the difference", async () => {
    const backend = new FakePollingDiscovery(silentLogger());
    backend.next = [new FakeDevice({ id: "A" }), new FakeDevice({ id: "B" })];
    await backend.devices();

    const added: string[] = [];
    const removed: string[] = [];
    backend.onAdded((d) => added.push(d.id));
    backend.onRemoved((d) => removed.push(d.id));

    backend.next = [new FakeDevice({ id: "B" }), new FakeDevice({ id: "C" })];
    const devices = await backend.discoverDevices({ timeoutMs: 100 });

    assert.deepStrictEqual(devices.map((d) => d.id), ["B", "C"]);
    assert.deepStrictEqual(added, ["C"]);
    assert.deepStrictEqual(removed, ["A"]);
    assert.deepStrictEqual(backend.timeouts, [undefined, 100]);
  });

  it("notifies for the first population", async () => {
    const backend = new FakePollingDiscovery(silentLogger());
    const added: string[] = [];
    backend.onAdded((d) => added.push(d.id));
    backend.next = [new FakeDevice({ id: "A" })];
    await backend.devices();
    assert.deepStrictEqual(added, ["A"]);
  });

  it("keeps the cache when a scan times out", async () => {
    const { logger, lines } = capturingLogger();
    const backend = new FakePollingDiscovery(logger);
    backend.next = [new FakeDevice({ id: "A" })];
    await backend.devices();

    backend.hang = true;
    const devices = await backend.discoverDevices({ timeoutMs: 20 });

    assert.deepStrictEqual(devices.map((d) => d.id), ["A"]);
    assert.ok(lines.some((line) => line.includes("[TRACE] fake: enumeration timed out; keeping cached devices")));
  });

  it("bounds a scan by its own timeout while the first population is in flight", async () => {
    const backend = new FakePollingDiscovery(silentLogger());
    backend.hang = true;
    const first = backend.devices();

    const started = Date.now();
    const devices = await backend.discoverDevices({ timeoutMs: 20 });

    assert.ok(Date.now() - started < 250);
    assert.deepStrictEqual(devices, []);
    assert.strictEqual(backend.hasPopulated, false);

    backend.next = [new FakeDevice({ id: "A" })];
    backend.releaseHung();
    assert.deepStrictEqual((await first).map((d) => d.id), ["A"]);
  });

  it("releases first queries once a scan fills the cache and drops the older result", async () => {
    const backend = new FakePollingDiscovery(silentLogger());
    const added: string[] = [];
    backend.onAdded((d) => added.push(d.id));
    backend.hang = true;
    const first = backend.devices();

    backend.hang = false;
    backend.next = [new FakeDevice({ id: "B" })];
    const scanned = await backend.discoverDevices({ timeoutMs: 100 });

    assert.deepStrictEqual(scanned.map((d) => d.id), ["B"]);
    assert.deepStrictEqual((await first).map((d) => d.id), ["B"]);

    backend.next = [new FakeDevice({ id: "A" })];
    backend.releaseHung();
    await sleep(5);

    assert.deepStrictEqual((await backend.devices()).map((d) => d.id), ["B"]);
    assert.deepStrictEqual(added, ["B"]);
  });

  it("keeps polling while the first population hangs", async () => {
    const backend = new FakePollingDiscovery(silentLogger(), {
      initialIntervalMs: 5,
      steadyIntervalMs: 5,
      tickTimeoutMs: 10,
    });
    backend.hang = true;
    const first = backend.devices();

    backend.startPolling();
    await waitFor(() => backend.calls >= 3);
    backend.hang = false;
    backend.next = [new FakeDevice({ id: "C" })];
    await waitFor(() => backend.hasPopulated);
    backend.dispose();

    assert.deepStrictEqual(backend.timeouts.slice(0, 3), [undefined, 10, 10]);
    assert.deepStrictEqual((await first).map((d) => d.id), ["C"]);
    backend.releaseHung();
  });

  it("skips a timed-out tick and keeps polling", async () => {
    const { logger, lines } = capturingLogger();
    const backend = new FakePollingDiscovery(logger, {
      initialIntervalMs: 5,
      steadyIntervalMs: 5,
      tickTimeoutMs: 10,
    });
    backend.next = [new FakeDevice({ id: "A" })];
    await backend.devices();
    const added: string[] = [];
    const removed: string[] = [];
    backend.onAdded((d) => added.push(d.id));
    backend.onRemoved((d) => removed.push(d.id));

    backend.startPolling();
    await waitFor(() => backend.calls >= 2);
    backend.hang = true;
    backend.next = [new FakeDevice({ id: "B" })];
    const hungFrom = backend.calls;
    await waitFor(() => backend.calls >= hungFrom + 2);

    assert.deepStrictEqual((await backend.devices()).map((d) => d.id), ["A"]);
    assert.deepStrictEqual(added, []);
    assert.deepStrictEqual(removed, []);
    assert.ok(lines.some((line) => line.includes("[TRACE] fake: enumeration timed out; keeping cached devices")));

    backend.hang = false;
    await waitFor(() => added.length === 1);
    backend.dispose();

    assert.deepStrictEqual(added, ["B"]);
    assert.deepStrictEqual(removed, ["A"]);
    backend.releaseHung();
  });

  it("propagates enumeration errors from a scan", async () => {
    const backend = new FakePollingDiscovery(silentLogger());
    backend.error = new Error("enumeration failed");
    await assert.rejects(backend.discoverDevices(), /enumeration failed/);
    assert.strictEqual(backend.hasPopulated, false);
  });

  it("polls unbounded first, then with the tick timeout", async () => {
    const backend = new FakePollingDiscovery(silentLogger(), {
      initialIntervalMs: 5,
      steadyIntervalMs: 5,
      tickTimeoutMs: 200,
    });
    const added: string[] = [];
    backend.onAdded((d) => added.push(d.id));
    backend.next = [new FakeDevice({ id: "A" })];

    backend.startPolling();
    assert.strictEqual(backend.isPolling, true);
    await waitFor(() => backend.calls >= 3);
    backend.dispose();

    assert.strictEqual(backend.isPolling, false);
    assert.strictEqual(backend.timeouts[0], undefined);
    assert.strictEqual(backend.timeouts[1], 200);
    assert.strictEqual(backend.timeouts[2], 200);
    assert.deepStrictEqual(added, ["A"]);
  });

  it("stops polling after dispose", async () => {
    const backend = new FakePollingDiscovery(silentLogger(), { initialIntervalMs: 5, steadyIntervalMs: 5 });
    backend.startPolling();
    await waitFor(() => backend.calls >= 1);
    backend.dispose();
    const calls = backend.calls;

    await sleep(40);

    assert.strictEqual(backend.calls, calls);
  });

  it("keeps polling after a failed tick", async () => {
    const { logger, lines } = capturingLogger();
    const backend = new FakePollingDiscovery(logger, { initialIntervalMs: 5, steadyIntervalMs: 5 });
    backend.error = new Error("adb crashed");
    backend.startPolling();

    await waitFor(() => backend.calls >= 2);
    backend.dispose();

    assert.ok(lines.some((line) => line.includes('[DEBUG] fake: poll failed {"error":"adb crashed"}')));
  });

  it("does not start polling once disposed", async () => {
    const backend = new FakePollingDiscovery(silentLogger(), { initialIntervalMs: 5 });
    backend.dispose();
    backend.startPolling();
    assert.strictEqual(backend.isPolling, false);
    await sleep(20);
    assert.strictEqual(backend.calls, 0);
  });

  it("ignores scan results that arrive after dispose", async () => {
    const backend = new FakePollingDiscovery(silentLogger());
    backend.next = [new FakeDevice({ id: "A" })];
    backend.dispose();
    assert.deepStrictEqual(await backend.discoverDevices(), []);
  });
});
