import { describe, expect, it } from "vitest";
import { StagedImage } from "../models";
import { SessionStore } from "./sessionStore";

function staged(name: string): StagedImage {
  return { storageRef: `/tmp/${name}`, originalName: name, size: 1024, detectedFormat: "JPEG" };
}

describe("SessionStore", () => {
  it("keeps images in arrival order per user", async () => {
    const store = new SessionStore();

    await store.add(1, 100, [staged("a.jpg")]);
    await store.add(2, 200, [staged("other.png")]);
    const result = await store.add(1, 100, [staged("b.jpg"), staged("c.jpg")]);

    expect(result.pending.map((image) => image.originalName)).toEqual(["a.jpg", "b.jpg", "c.jpg"]);
    expect((await store.snapshot(2)).map((image) => image.originalName)).toEqual(["other.png"]);
    expect(store.activeSessions).toBe(2);
  });

  it("serialises concurrent adds for one user without losing images", async () => {
    const store = new SessionStore();

    await Promise.all(
      Array.from({ length: 10 }, (_, index) => store.add(7, 70, [staged(`${index}.png`)]))
    );

    expect((await store.snapshot(7)).map((image) => image.originalName)).toEqual(
      Array.from({ length: 10 }, (_, index) => `${index}.png`)
    );
  });

  it("rejects images beyond the batch limit", async () => {
    const store = new SessionStore(3);

    await store.add(1, 100, [staged("a.jpg"), staged("b.jpg")]);
    const result = await store.add(1, 100, [staged("c.jpg"), staged("d.jpg")]);

    expect(result.accepted.map((image) => image.originalName)).toEqual(["c.jpg"]);
    expect(result.rejected.map((image) => image.originalName)).toEqual(["d.jpg"]);
    expect(result.pending).toHaveLength(3);
  });

  it("does not create a session when nothing is accepted", async () => {
    const store = new SessionStore(0);

    const result = await store.add(1, 100, [staged("a.jpg")]);

    expect(result.rejected).toHaveLength(1);
    expect(store.activeSessions).toBe(0);
  });

  it("tracks the status message until the batch is taken", async () => {
    const store = new SessionStore();
    await store.add(1, 100, [staged("a.jpg"), staged("b.jpg")]);
    await store.setStatusHandle(1, { chatId: 100, messageId: 5 });

    expect(await store.statusHandle(1)).toEqual({ chatId: 100, messageId: 5 });

    const batch = await store.take(1);
    expect(batch.map((image) => image.originalName)).toEqual(["a.jpg", "b.jpg"]);
    expect(await store.snapshot(1)).toEqual([]);
    expect(await store.statusHandle(1)).toBeNull();
    expect(await store.take(1)).toEqual([]);
  });

  it("returns dropped images on clear", async () => {
    const store = new SessionStore();
    await store.add(1, 100, [staged("a.jpg")]);

    expect(await store.clear(1)).toEqual([staged("a.jpg")]);
    expect(await store.clear(1)).toEqual([]);
    expect(store.activeSessions).toBe(0);
  });

  it("expires sessions idle for longer than the TTL", async () => {
    const store = new SessionStore();
    await store.add(1, 100, [staged("old.jpg")], 1_000);
    await store.add(2, 200, [staged("fresh.jpg")], 50_000);

    const expired = await store.expireIdle(30_000, 60_000);

    expect(expired).toEqual([{ userId: 1, chatId: 100, images: [staged("old.jpg")] }]);
    expect(await store.snapshot(1)).toEqual([]);
    expect(await store.snapshot(2)).toHaveLength(1);
  });

  it("drains every session", async () => {
    const store = new SessionStore();
    await store.add(1, 100, [staged("a.jpg")]);
    await store.add(2, 200, [staged("b.jpg"), staged("c.jpg")]);

    const drained = await store.drain();

    expect(drained.map((session) => session.images.length)).toEqual([1, 2]);
    expect(store.activeSessions).toBe(0);
  });
});
