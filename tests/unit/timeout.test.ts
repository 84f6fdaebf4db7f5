import { describe, it, expect } from "vitest";
import { Deadline, withTimeout } from "../../src/core/timeout";

describe("Deadline", () => {
  it("should expire once the clock passes the budget", () => {
    let now = 1000;
    const deadline = new Deadline(2, () => now);

    expect(deadline.expired()).toBe(false);
    expect(deadline.remainingMs()).toBe(2000);

    now += 1500;
    expect(deadline.elapsedMs()).toBe(1500);
    expect(deadline.expired()).toBe(false);

    now += 500;
    expect(deadline.expired()).toBe(true);
    expect(deadline.remainingMs()).toBe(0);
  });
});

describe("withTimeout", () => {
  it("should resolve with the value when the promise settles in time", async () => {
    await expect(withTimeout(Promise.resolve(42), 50, new Error("late"))).resolves.toBe(42);
  });

  it("should reject with the given error when the promise hangs", async () => {
    const hanging = new Promise<number>(() => undefined);
    await expect(withTimeout(hanging, 10, new Error("late"))).rejects.toThrow("late");
  });
});
