import { describe, it, expect, vi } from "vitest";
import { EventQueue } from "../src/runtime/event-queue";

describe("EventQueue", () => {
  it("should hand out items in FIFO order", async () => {
    const queue = new EventQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.push(3);

    expect(await queue.take(10)).toBe(1);
    expect(await queue.take(10)).toBe(2);
    expect(await queue.take(10)).toBe(3);
    expect(queue.size).toBe(0);
  });

  it("should resolve a waiting consumer on push", async () => {
    const queue = new EventQueue<string>();
    const pending = queue.take(1_000);

    queue.push("ready");

    expect(await pending).toBe("ready");
    expect(queue.size).toBe(0);
  });

  it("should resolve undefined when nothing arrives in time", async () => {
    const queue = new EventQueue<string>();
    expect(await queue.take(5)).toBeUndefined();
  });

  it("should accept items again after a wait times out", async () => {
    const queue = new EventQueue<string>();
    await queue.take(5);

    queue.push("later");

    expect(queue.size).toBe(1);
    expect(await queue.take(5)).toBe("later");
  });

  it("should reject a second concurrent consumer", async () => {
    const queue = new EventQueue<number>();
    const first = queue.take(1_000);

    await expect(queue.take(1_000)).rejects.toThrow(
      "EventQueue supports a single consumer",
    );

    queue.push(7);
    expect(await first).toBe(7);
  });

  it("should report crossing capacity once per crossing", () => {
    const onHighWater = vi.fn();
    const queue = new EventQueue<number>({ capacity: 2, onHighWater });

    queue.push(1);
    queue.push(2);
    expect(onHighWater).not.toHaveBeenCalled();

    queue.push(3);
    queue.push(4);
    expect(onHighWater).toHaveBeenCalledTimes(1);
    expect(onHighWater).toHaveBeenCalledWith(3);

    expect(queue.drain()).toEqual([1, 2, 3, 4]);

    queue.push(5);
    queue.push(6);
    queue.push(7);
    expect(onHighWater).toHaveBeenCalledTimes(2);
  });

  it("should never drop items above capacity", async () => {
    const queue = new EventQueue<number>({ capacity: 1 });
    for (let i = 0; i < 5; i++) queue.push(i);

    expect(queue.size).toBe(5);
    expect(await queue.take(1)).toBe(0);
  });

  it("should drain everything queued", () => {
    const queue = new EventQueue<string>();
    queue.push("a");
    queue.push("b");

    expect(queue.drain()).toEqual(["a", "b"]);
    expect(queue.drain()).toEqual([]);
    expect(queue.size).toBe(0);
  });
});
