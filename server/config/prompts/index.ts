/**
 * Centralized Prompt Configuration
 *
 * All LLM prompts are maintained here so wording changes are reviewed in
 * one place and tracked through PROMPT_VERSIONS.
 *
 * Structure:
 * - system.ts: Analyst persona shared by every tier
 * - earnings.ts: Tier A/B/C queries and the context + query user prompt
 */

export * from "./system";
export * from "./earnings";
