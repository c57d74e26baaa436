import { describe, it } from "node:test";
import assert from "node:assert";
import type { Device } from "../../../src/backend/devices/types.js";
import { DeviceListNotifier } from "../../../src/backend/discovery/deviceListNotifier.js";
import { FakeDevice } from "../../helpers/fakes.js";

function track(notifier: DeviceListNotifier): { added: string[]; removed: string[] } {
  const added: string[] = [];
  const removed: string[] = [];
  notifier.onAdded((d: Device) => added.push(d.id));
  notifier.onRemoved((d: Device) => removed.push(d.id));
  return { added, removed };
}

describe("DeviceListNotifier", () => {
  it("reports one addition and one removal for {A,B} to {B,C}", () => {
    const a = new FakeDevice({ id: "A" });
    const b = new FakeDevice({ id: "B" });
    const c = new FakeDevice({ id: "C" });
    const notifier = new DeviceListNotifier([a, b]);
    const events = track(notifier);

    notifier.updateWithNewList([b, c]);

    assert.deepStrictEqual(events, { added: ["C"], removed: ["A"] });
    assert.deepStrictEqual(
      notifier.items.map((d) => d.id),
      ["B", "C"]
    );
  });

  it("replaces a device with the same id silently", () => {
    const notifier = new DeviceListNotifier([new FakeDevice({ id: "A", name: "Old" })]);
    const events = track(notifier);
    const renamed = new FakeDevice({ id: "A", name: "New" });

    notifier.updateWithNewList([renamed]);

    assert.deepStrictEqual(events, { added: [], removed: [] });
    assert.strictEqual(notifier.items[0], renamed);
  });

  it("stops notifying after unsubscribe", () => {
    const notifier = new DeviceListNotifier();
    const seen: string[] = [];
    const unsubscribe = notifier.onAdded((d) => seen.push(d.id));

    notifier.updateWithNewList([new FakeDevice({ id: "A" })]);
    unsubscribe();
    notifier.updateWithNewList([new FakeDevice({ id: "A" }), new FakeDevice({ id: "B" })]);

    assert.deepStrictEqual(seen, ["A"]);
  });

  it("copies the list it is given", () => {
    const input: Device[] = [new FakeDevice({ id: "A" })];
    const notifier = new DeviceListNotifier();
    notifier.updateWithNewList(input);
    input.push(new FakeDevice({ id: "B" }));
    assert.strictEqual(notifier.items.length, 1);
  });
});
