import { describe, expect, it } from "vitest";
import { isBusyGroupError, isNoGroupError } from "../src/transport/MessageTransport.js";
import { LocalTransport } from "../src/transport/LocalTransport.js";

function ids(result: Awaited<ReturnType<LocalTransport["xReadGroup"]>>, stream: string) {
  return result?.[stream]?.messages.map((m) => m.fields.n) ?? [];
}

describe("LocalTransport", () => {
  it("delivers each entry once per group and keeps it pending until acked", async () => {
    const transport = new LocalTransport();
    await transport.xAdd("s", "*", { n: "1" });
    await transport.xAdd("s", "*", { n: "2" });
    await transport.xGroupCreate("s", "g", "0");

    const first = await transport.xReadGroup("g", "c1", { key: "s", id: ">" });
    expect(ids(first, "s")).toEqual(["1", "2"]);
    expect(await transport.xReadGroup("g", "c1", { key: "s", id: ">" })).toBeNull();
    expect(ids(await transport.xReadGroup("g", "c1", { key: "s", id: "0" }), "s")).toEqual(["1", "2"]);

    const firstId = first?.s.messages[0].id ?? "";
    expect(await transport.xAck("s", "g", firstId)).toBe(1);

    const replay = await transport.xReadGroup("g", "c1", { key: "s", id: "0" });
    expect(ids(replay, "s")).toEqual(["2"]);
  });

  it("starts a '$' group after the existing entries", async () => {
    const transport = new LocalTransport();
    await transport.xAdd("s", "*", { n: "old" });
    await transport.xGroupCreate("s", "g", "$");
    await transport.xAdd("s", "*", { n: "new" });

    expect(ids(await transport.xReadGroup("g", "c", { key: "s", id: ">" }), "s")).toEqual(["new"]);
  });

  it("honours COUNT", async () => {
    const transport = new LocalTransport();
    for (const n of ["1", "2", "3"]) await transport.xAdd("s", "*", { n });
    await transport.xGroupCreate("s", "g", "0");

    expect(ids(await transport.xReadGroup("g", "c", { key: "s", id: ">" }, { COUNT: 2 }), "s")).toEqual(["1", "2"]);
    expect(ids(await transport.xReadGroup("g", "c", { key: "s", id: ">" }, { COUNT: 2 }), "s")).toEqual(["3"]);
  });

  it("wakes a blocked reader when an entry arrives", async () => {
    const transport = new LocalTransport();
    await transport.xGroupCreate("s", "g", "$", { MKSTREAM: true });

    const pending = transport.xReadGroup("g", "c", { key: "s", id: ">" }, { BLOCK: 5000 });
    await transport.xAdd("s", "*", { n: "late" });

    expect(ids(await pending, "s")).toEqual(["late"]);
  });

  it("returns null when a blocking read times out", async () => {
    const transport = new LocalTransport();
    await transport.xGroupCreate("s", "g", "$", { MKSTREAM: true });
    expect(await transport.xReadGroup("g", "c", { key: "s", id: ">" }, { BLOCK: 5 })).toBeNull();
  });

  it("raises the Redis group errors", async () => {
    const transport = new LocalTransport();
    await expect(transport.xGroupCreate("missing", "g", "0")).rejects.toThrow("ERR no such key");

    await transport.xGroupCreate("s", "g", "0", { MKSTREAM: true });
    const busy = await transport.xGroupCreate("s", "g", "0").catch((e: unknown) => e);
    expect(isBusyGroupError(busy)).toBe(true);

    const noGroup = await transport.xReadGroup("other", "c", { key: "s", id: ">" }).catch((e: unknown) => e);
    expect(isNoGroupError(noGroup)).toBe(true);
  });

  it("reads without a group and counts entries", async () => {
    const transport = new LocalTransport();
    await transport.xAdd("s", "*", { n: "1" });
    await transport.xAdd("s", "*", { n: "2" });

    const all = await transport.xRead({ key: "s", id: "0" });
    expect(all?.s.messages.map((m) => m.fields.n)).toEqual(["1", "2"]);
    expect(await transport.xLen("s")).toBe(2);
    expect(await transport.xLen("nothing")).toBe(0);
  });
});
