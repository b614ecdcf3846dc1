import { CancelledError, TimeoutError } from "@skyforge/adapters-common";
import { pollUntil, type PollResult } from "./polling";

describe("pollUntil", () => {
  let sleep: jest.Mock;

  beforeEach(() => {
    sleep = jest.fn().mockResolvedValue(undefined);
  });

  it("returns on the first successful attempt without sleeping", async () => {
    const check = jest.fn().mockResolvedValue({ done: true, value: "ok" });

    const result = await pollUntil(check, { maxAttempts: 5, delayMs: 100, description: "x", sleep });

    expect(result).toBe("ok");
    expect(check).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("sleeps between attempts with the fixed delay", async () => {
    const check = jest
      .fn<Promise<PollResult<number>>, [number]>()
      .mockResolvedValueOnce({ done: false })
      .mockResolvedValueOnce({ done: false })
      .mockResolvedValueOnce({ done: true, value: 3 });

    const result = await pollUntil(check, { maxAttempts: 5, delayMs: 250, description: "x", sleep });

    expect(result).toBe(3);
    expect(check.mock.calls.map((call) => call[0])).toEqual([1, 2, 3]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it("sleeps before the first attempt when delayFirst is set", async () => {
    const check = jest.fn().mockResolvedValue({ done: true, value: 1 });

    await pollUntil(check, { maxAttempts: 5, delayMs: 10, description: "x", sleep, delayFirst: true });

    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("throws TimeoutError after exactly maxAttempts checks", async () => {
    const check = jest.fn().mockResolvedValue({ done: false });

    const promise = pollUntil(check, { maxAttempts: 4, delayMs: 10, description: "the task", sleep });

    await expect(promise).rejects.toThrow(TimeoutError);
    await expect(promise).rejects.toThrow("Timed out waiting for the task after 4 attempts");
    expect(check).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledTimes(3);
  });

  it("propagates an error thrown by a check without further attempts", async () => {
    const check = jest.fn().mockRejectedValue(new Error("boom"));

    await expect(
      pollUntil(check, { maxAttempts: 4, delayMs: 10, description: "x", sleep }),
    ).rejects.toThrow("boom");
    expect(check).toHaveBeenCalledTimes(1);
  });

  it("throws CancelledError when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const check = jest.fn();

    await expect(
      pollUntil(check, { maxAttempts: 4, delayMs: 10, description: "x", sleep, signal: controller.signal }),
    ).rejects.toThrow(CancelledError);
    expect(check).not.toHaveBeenCalled();
  });

  it("stops between attempts once the signal is aborted", async () => {
    const controller = new AbortController();
    const check = jest.fn().mockImplementation(async () => {
      controller.abort();
      return { done: false };
    });

    await expect(
      pollUntil(check, { maxAttempts: 4, delayMs: 10, description: "x", sleep, signal: controller.signal }),
    ).rejects.toThrow("Cancelled while waiting for x");
    expect(check).toHaveBeenCalledTimes(1);
  });

  it("logs progress after each unfinished attempt", async () => {
    const log = jest.fn();
    const check = jest
      .fn<Promise<PollResult<string>>, [number]>()
      .mockResolvedValueOnce({ done: false })
      .mockResolvedValueOnce({ done: true, value: "v" });

    await pollUntil(check, { maxAttempts: 3, delayMs: 10, description: "import", sleep, log });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("Waiting for import (1/3)...");
  });
});
