import { describe, it, expect } from "vitest";
import { Sequencer } from "../src/utils/sequencer.js";

describe("Sequencer", () => {
  it("runs tasks one after another in submission order", async () => {
    const seq = new Sequencer();
    const events: string[] = [];
    const task = (name: string, ticks: number) => async () => {
      events.push(`${name}:start`);
      for (let i = 0; i < ticks; i++) await Promise.resolve();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([seq.queue(task("a", 5)), seq.queue(task("b", 0)), seq.queue(task("c", 2))]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("keeps going after a failed task", async () => {
    const seq = new Sequencer();
    const failed = seq.queue(async () => { throw new Error("boom"); });
    const next = seq.queue(async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});
