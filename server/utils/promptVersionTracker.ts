/**
 * Prompt Version Tracker
 *
 * Tracks which prompt versions are used during one analysis run so they can
 * be stored with the result.
 */

import { PROMPT_VERSIONS, type PromptVersions } from "../config/prompts/versions";

export type PromptUsageRecord = Partial<Record<keyof PromptVersions, string>>;

export class PromptVersionTracker {
    private versions: PromptUsageRecord = {};

    /**
     * Record that a prompt was used, at its current version.
     */
    track(promptName: keyof PromptVersions): void {
        this.versions[promptName] = PROMPT_VERSIONS[promptName];
    }

    getVersions(): PromptUsageRecord {
        return { ...this.versions };
    }
}
