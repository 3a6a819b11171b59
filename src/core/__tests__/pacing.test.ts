import { describe, expect, it } from "vitest";
import { FakeClock } from "../../__tests__/helpers/fakes";
import { backoffDelayMs, Pacer } from "../pacing";

describe("Pacer", () => {
  it("does not wait before the first call", async () => {
    const clock = new FakeClock();
    const pacer = new Pacer(clock, 2_000);

    await pacer.wait();

    expect(clock.sleeps).toEqual([]);
  });

  it("keeps the configured gap between call starts", async () => {
    const clock = new FakeClock();
    const pacer = new Pacer(clock, 2_000);

    await pacer.wait();
    clock.advance(500);
    await pacer.wait();
    await pacer.wait();

    expect(clock.sleeps).toEqual([1_500, 2_000]);
  });

  it("does not sleep when enough time has passed", async () => {
    const clock = new FakeClock();
    const pacer = new Pacer(clock, 2_000);

    await pacer.wait();
    clock.advance(5_000);
    await pacer.wait();

    expect(clock.sleeps).toEqual([]);
  });
});

describe("backoffDelayMs", () => {
  it("doubles per attempt up to the ceiling", () => {
    expect(backoffDelayMs(1, 1_000, 10_000)).toBe(1_000);
    expect(backoffDelayMs(3, 1_000, 10_000)).toBe(4_000);
    expect(backoffDelayMs(5, 1_000, 10_000)).toBe(10_000);
  });
});
