import { TransientComputeError } from "@/utils/errors";
import { createDeadline, withTimeout } from "@/utils/helpers/timeout";

describe("withTimeout", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  test("resolves with the task result", async () => {
    await expect(withTimeout(Promise.resolve(42), 100, "answer")).resolves.toBe(42);
  });

  test("passes task errors through", async () => {
    await expect(
      withTimeout(Promise.reject(new Error("boom")), 100, "answer"),
    ).rejects.toThrow("boom");
  });

  test("rejects with a transient error when the task is too slow", async () => {
    jest.useFakeTimers();
    const pending = withTimeout(new Promise<number>(() => undefined), 50, "route estimate");
    const assertion = expect(pending).rejects.toThrow(
      new TransientComputeError("route estimate timed out after 50ms"),
    );

    jest.advanceTimersByTime(50);

    await assertion;
  });

  test("skips the timer for a non-finite timeout", async () => {
    await expect(withTimeout(Promise.resolve("ok"), Infinity, "unbounded")).resolves.toBe("ok");
  });
});

describe("createDeadline", () => {
  test("counts down against the clock", () => {
    let now = 1000;
    const deadline = createDeadline(500, () => now);

    expect(deadline.remainingMs()).toBe(500);
    now = 1300;
    expect(deadline.remainingMs()).toBe(200);
    now = 2000;
    expect(deadline.remainingMs()).toBe(0);
  });
});
