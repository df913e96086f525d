import { describe, it, expect } from "vitest";
import { PROMPT_CHANGE_LOG, PROMPT_VERSIONS, type PromptVersions } from "../config/prompts/versions";
import { PromptVersionTracker } from "../utils/promptVersionTracker";

const PROMPT_NAMES: (keyof PromptVersions)[] = [
  "EARNINGS_ANALYST_SYSTEM_PROMPT",
  "TIER_A_QUERY",
  "TIER_B_QUERY",
  "TIER_C_QUERY",
];

describe("prompt versions", () => {
  it("logs the current version of every prompt first", () => {
    for (const name of PROMPT_NAMES) {
      expect(PROMPT_CHANGE_LOG[name][0]?.version).toBe(PROMPT_VERSIONS[name]);
    }
  });
});

describe("PromptVersionTracker", () => {
  it("records only the prompts that were used", () => {
    const tracker = new PromptVersionTracker();
    tracker.track("TIER_B_QUERY");

    expect(tracker.getVersions()).toEqual({ TIER_B_QUERY: PROMPT_VERSIONS.TIER_B_QUERY });
  });

  it("returns a copy", () => {
    const tracker = new PromptVersionTracker();
    tracker.track("TIER_A_QUERY");
    const versions = tracker.getVersions();
    tracker.track("TIER_C_QUERY");

    expect(Object.keys(versions)).toEqual(["TIER_A_QUERY"]);
  });
});
