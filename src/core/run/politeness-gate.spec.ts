import { PolitenessGate } from "./politeness-gate";
import { systemClock } from "./clock";
import { RunCancelledError } from "../../common/errors/pipeline.errors";
import { FakeClock } from "../../../test/helpers/fake-clock";

describe("PolitenessGate", () => {
  let clock: FakeClock;
  let gate: PolitenessGate;

  beforeEach(() => {
    clock = new FakeClock(1000);
    gate = new PolitenessGate(500, clock);
  });

  it("lets the first request to a domain through immediately", async () => {
    await gate.acquire("acme.test");

    expect(clock.sleeps).toEqual([]);
  });

  it("spaces consecutive requests to the same domain", async () => {
    await gate.acquire("acme.test");
    await gate.acquire("acme.test");

    expect(clock.sleeps).toEqual([500]);
  });

  it("only waits for what is left of the delay", async () => {
    await gate.acquire("acme.test");
    clock.advance(300);
    await gate.acquire("acme.test");

    expect(clock.sleeps).toEqual([200]);
  });

  it("keeps domains independent", async () => {
    await gate.acquire("acme.test");
    await gate.acquire("nova.test");

    expect(clock.sleeps).toEqual([]);
  });

  it("serialises concurrent callers for one domain", async () => {
    await Promise.all([
      gate.acquire("acme.test"),
      gate.acquire("acme.test"),
      gate.acquire("acme.test"),
    ]);

    expect(clock.sleeps).toEqual([500, 500]);
  });

  it("does not wait when the delay is zero", async () => {
    const eager = new PolitenessGate(0, clock);

    await eager.acquire("acme.test");
    await eager.acquire("acme.test");

    expect(clock.sleeps).toEqual([]);
  });

  it("releases a waiting caller when the run is cancelled", async () => {
    const controller = new AbortController();
    const slow = new PolitenessGate(60_000, systemClock, controller.signal);
    await slow.acquire("acme.test");

    const waiting = slow.acquire("acme.test");
    controller.abort(new RunCancelledError("Interrupted"));

    await expect(waiting).rejects.toThrow("Interrupted");
  });
});
