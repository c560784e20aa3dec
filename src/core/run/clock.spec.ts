import { abortReason, systemClock } from "./clock";
import { RunCancelledError } from "../../common/errors/pipeline.errors";

describe("systemClock.sleep", () => {
  it("resolves after the delay", async () => {
    await expect(systemClock.sleep(1)).resolves.toBeUndefined();
  });

  it("rejects at once when the signal has already aborted", async () => {
    const controller = new AbortController();
    controller.abort(new RunCancelledError("Interrupted"));

    await expect(systemClock.sleep(60_000, controller.signal)).rejects.toThrow(
      "Interrupted",
    );
  });

  it("stops waiting when the signal aborts mid-sleep", async () => {
    const controller = new AbortController();
    const sleeping = systemClock.sleep(60_000, controller.signal);

    controller.abort(new RunCancelledError("Interrupted"));

    await expect(sleeping).rejects.toBeInstanceOf(RunCancelledError);
  });
});

describe("abortReason", () => {
  it("falls back to a cancellation error for non-error reasons", () => {
    const controller = new AbortController();
    controller.abort("stop");

    expect(abortReason(controller.signal)).toBeInstanceOf(RunCancelledError);
  });
});
