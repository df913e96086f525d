/**
 * Earnings Call Tier Prompts
 *
 * The three fixed analytical queries issued per transcript. Each query is
 * sent with a context assembled for its focus (see server/rag/contextBuilder.ts).
 */

/**
 * Tier A: why the stock moved.
 * Parsed line by line; only bullet or numbered lines survive.
 */
export const TIER_A_QUERY = `
Analyze this earnings call transcript and identify 4-8 key factors that likely contributed to the post-earnings price reaction.
For each factor, provide:
1. A clear, concise bullet point
2. Whether it's positive, negative, or neutral
3. A confidence score (0-100)
4. A specific citation from the transcript

Focus on: revenue performance, guidance changes, margin trends, strategic announcements, and market reactions.
Return one factor per line, each line starting with "• ".
`.trim();

/**
 * Tier B: plain-language summary. Used verbatim.
 */
export const TIER_B_QUERY = `
Write a clear, jargon-free summary of this earnings call that a non-finance person can understand.
Target reading level: Grade 10-12
Define all financial terms inline
Focus on: what the company does, how they performed, what they expect, and why it matters
`.trim();

/**
 * Tier C: expert analysis.
 */
export const TIER_C_QUERY = `
Provide a sophisticated expert analysis including:
1. Quantitative extracts (growth rates, margins, guidance deltas, unit economics)
2. Segment performance analysis
3. Risk factors and concerns
4. Key analyst Q&A highlights
5. Forward-looking indicators

Cite specific claims with transcript references.
`.trim();

/**
 * User prompt: assembled context followed by the tier query.
 */
export function buildTierUserPrompt(context: string, query: string): string {
  return `Context:\n${context}\n\nQuery: ${query}`;
}
