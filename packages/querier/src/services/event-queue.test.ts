import { describe, it, expect } from "vitest";
import { EventQueue } from "./event-queue.js";

describe("EventQueue", () => {
  it("hands out buffered events in push order", async () => {
    const queue = new EventQueue<string>();
    queue.push("a");
    queue.push("b");
    expect(queue.size).toBe(2);

    expect(await queue.next()).toBe("a");
    expect(await queue.next()).toBe("b");
    expect(queue.size).toBe(0);
  });

  it("wakes a waiting consumer on push", async () => {
    const queue = new EventQueue<number>();
    const pending = queue.next();
    queue.push(7);
    expect(await pending).toBe(7);
    expect(queue.size).toBe(0);
  });

  it("allows one waiting consumer only", async () => {
    const queue = new EventQueue<number>();
    const first = queue.next();
    await expect(queue.next()).rejects.toThrow("EventQueue already has a pending consumer");
    queue.push(1);
    expect(await first).toBe(1);
  });
});
