/**
 * Prompt sent alongside every lineup image
 */

export const LINEUP_EXTRACTION_PROMPT = `Analyze this festival lineup image and extract ALL artist/performer names you can see.

Rules:
- Extract only artist/band/performer names
- Do NOT include stage names, dates, times, or other text
- List each artist on a new line
- Normalize capitalization to the artist's official/proper spelling (e.g., "Skrillex" not "SKRILLEX", "Four Tet" not "FOUR TET")
- Keep acronyms and stylized names correct (e.g., "SG Lewis", "RÜFÜS DU SOL", "DJ Trixie Mattel", "Aly & AJ")
- If a name appears multiple times, only list it once
- Order them roughly by how prominently they appear (headliners first, then smaller acts)

Return ONLY the list of names, one per line, with no additional text or formatting.`;
