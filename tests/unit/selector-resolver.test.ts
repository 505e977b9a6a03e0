import { describe, expect, it } from "vitest";
import { css, xpath, type LocatorCandidate } from "../../pipeline/services/browser-session.js";
import {
  iterateResolvedCandidates,
  resolveTarget,
  type SelectorTarget
} from "../../pipeline/services/selector-resolver.js";
import { FakeBrowserSession, FakeElement, createRecordingLog } from "../test-utils.js";

const first = css("#first");
const second = xpath("//*[@id='second']");
const third = css(".third");

const target: SelectorTarget = {
  name: "test button",
  requirement: "clickable",
  candidates: [first, second, third]
};

const OPTIONS = { timeoutMs: 10 };

describe("resolveTarget", () => {
  it("returns the first candidate that resolves and stops probing", async () => {
    const session = new FakeBrowserSession();
    const secondElement = new FakeElement();
    session.on(second, secondElement).on(third, new FakeElement());

    const result = await resolveTarget(session, target, OPTIONS, createRecordingLog());

    expect(result).toEqual({
      found: true,
      element: secondElement,
      candidate: second,
      candidateIndex: 1
    });
    expect(session.probed).toEqual(["css=#first", "xpath=//*[@id='second']"]);
  });

  it("reports every attempted candidate when nothing resolves", async () => {
    const session = new FakeBrowserSession();

    const result = await resolveTarget(session, target, OPTIONS, createRecordingLog());

    expect(result).toEqual({
      found: false,
      target: "test button",
      attempted: ["css=#first", "xpath=//*[@id='second']", "css=.third"]
    });
  });

  it("skips elements that are not clickable", async () => {
    const session = new FakeBrowserSession();
    const enabled = new FakeElement();
    session.on(first, new FakeElement({ enabled: false })).on(second, enabled);

    const result = await resolveTarget(session, target, OPTIONS, createRecordingLog());

    expect(result.found && result.element).toBe(enabled);
  });

  it("treats a probe error as that candidate failing", async () => {
    const session = new FakeBrowserSession();
    const fallback = new FakeElement();
    session.onMatch(
      (candidate: LocatorCandidate) => candidate === first,
      () => {
        throw new Error("detached frame");
      }
    );
    session.on(second, fallback);
    const log = createRecordingLog();

    const result = await resolveTarget(session, target, OPTIONS, log);

    expect(result.found && result.candidateIndex).toBe(1);
    expect(log.lines).toContain(
      "debug [resolver] test button: candidate 1 (css=#first) errored: detached frame"
    );
  });

  it("moves on when the accept check rejects an element", async () => {
    const session = new FakeBrowserSession();
    const hidden = new FakeElement({ attributes: { class: "disabled" } });
    const usable = new FakeElement();
    session.on(first, hidden).on(third, usable);

    const result = await resolveTarget(
      session,
      target,
      {
        ...OPTIONS,
        accept: async (element) => (await element.getAttribute("class")) !== "disabled"
      },
      createRecordingLog()
    );

    expect(result.found && result.element).toBe(usable);
  });
});

describe("iterateResolvedCandidates", () => {
  it("yields every resolving candidate in order", async () => {
    const session = new FakeBrowserSession();
    session.on(first, new FakeElement()).on(third, new FakeElement());

    const indexes: number[] = [];
    for await (const resolved of iterateResolvedCandidates(session, target, OPTIONS, createRecordingLog())) {
      indexes.push(resolved.candidateIndex);
    }

    expect(indexes).toEqual([0, 2]);
  });

  it("stops probing when the caller breaks out", async () => {
    const session = new FakeBrowserSession();
    session.on(first, new FakeElement()).on(second, new FakeElement());

    for await (const resolved of iterateResolvedCandidates(session, target, OPTIONS, createRecordingLog())) {
      expect(resolved.candidate).toBe(first);
      break;
    }

    expect(session.probed).toEqual(["css=#first"]);
  });
});
