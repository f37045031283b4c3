// ============================================================================
// Personalization Module — Barrel Export
// ============================================================================

export { generatePersonalization } from './personalizer.js';
export type { PersonalizationResult } from './personalizer.js';
export { buildPersonalizationPrompt, formatSuffix, MAX_SUFFIX_LENGTH } from './prompt.js';
