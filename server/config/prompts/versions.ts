/**
 * Prompt Version Management
 *
 * Date-based versioning: YYYY-MM-DD-NNN.
 *
 * When updating a prompt:
 * 1. Increment the version number
 * 2. Add a PROMPT_CHANGE_LOG entry with the reason
 */

export type PromptVersions = {
    EARNINGS_ANALYST_SYSTEM_PROMPT: string;
    TIER_A_QUERY: string;
    TIER_B_QUERY: string;
    TIER_C_QUERY: string;
};

export const PROMPT_VERSIONS: PromptVersions = {
    EARNINGS_ANALYST_SYSTEM_PROMPT: "2026-10-02-001",
    TIER_A_QUERY: "2026-10-09-002",
    TIER_B_QUERY: "2026-10-02-001",
    TIER_C_QUERY: "2026-10-02-001",
};

export const PROMPT_CHANGE_LOG: Record<keyof PromptVersions, Array<{ version: string; reason: string; date: string }>> = {
    EARNINGS_ANALYST_SYSTEM_PROMPT: [
        { version: "2026-10-02-001", reason: "Initial version", date: "2026-10-02" }
    ],
    TIER_A_QUERY: [
        { version: "2026-10-09-002", reason: "Ask for one factor per line with a bullet marker; unmarked lines were dropped by the parser", date: "2026-10-09" },
        { version: "2026-10-02-001", reason: "Initial version", date: "2026-10-02" }
    ],
    TIER_B_QUERY: [
        { version: "2026-10-02-001", reason: "Initial version", date: "2026-10-02" }
    ],
    TIER_C_QUERY: [
        { version: "2026-10-02-001", reason: "Initial version", date: "2026-10-02" }
    ],
};
