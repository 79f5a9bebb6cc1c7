/**
 * Content Generation Configuration
 *
 * Tuning for agents, retries, the pipeline and output parsing, checked at load time.
 * Keyword lists live in extraction-keywords.json.
 */

import extractionKeywords from './extraction-keywords.json';

class ConfigValidationError extends Error {
  readonly name = 'ConfigValidationError';

  constructor(message: string) {
    super(`Content generation config error: ${message}`);
  }
}

function check(condition: boolean, message: string): void {
  if (!condition) throw new ConfigValidationError(message);
}

const positive = (value: number, name: string) => check(value > 0, `${name} must be positive (got ${value})`);

// ============================================================================
// Agent Configuration
// ============================================================================

/**
 * Settings shared by every agent call.
 */
export const AGENT_CONFIG = {
  TEMPERATURE: 0.7,
  /** Per-attempt timeout for a single LLM call */
  TIMEOUT_MS: 120000,
  /** Characters of the task description shown in the "Executing task" log line */
  LOG_DESCRIPTION_CHARS: 120,
} as const;

/**
 * Writer defaults.
 */
export const WRITER_CONFIG = {
  DEFAULT_WORD_COUNT: 1000,
  DEFAULT_SECTION_LENGTH: 300,
  DEFAULT_TONE: 'professional',
} as const;

/**
 * Research requirement limits: how much of the research feeds the Writer.
 */
export const RESEARCH_REQUIREMENTS_CONFIG = {
  MAX_KEY_FACTS: 5,
  MAX_SOURCES: 3,
  MAX_INSIGHTS: 3,
} as const;

/**
 * Creative defaults.
 */
export const CREATIVE_CONFIG = {
  DEFAULT_IDEA_COUNT: 10,
  DEFAULT_HEADLINE_COUNT: 15,
  DEFAULT_HOOK_COUNT: 10,
  DEFAULT_CONCEPT_COUNT: 8,
  DEFAULT_SERIES_LENGTH: 5,
  /** Headlines brainstormed during the pipeline's creative phase */
  PIPELINE_HEADLINE_COUNT: 5,
} as const;

// ============================================================================
// Output Parsing Keywords
// ============================================================================

/**
 * Keywords that pull structured lists out of free-form agent output, grouped by
 * operation. A line is selected when its lowercase text contains any keyword.
 */
export const EXTRACTION_KEYWORDS = extractionKeywords;

// ============================================================================
// Retry Configuration
// ============================================================================

export const RETRY_CONFIG = {
  MAX_RETRIES: 3,
  INITIAL_DELAY_MS: 1000,
  MAX_DELAY_MS: 10000,
  BACKOFF_MULTIPLIER: 2,
} as const;

// ============================================================================
// Pipeline Configuration
// ============================================================================

export const PIPELINE_CONFIG = {
  /** Overall timeout for one pipeline run (0 disables) */
  DEFAULT_TIMEOUT_MS: 10 * 60 * 1000,
  /** Word limit applied when the caller passes none (MAX_CONTENT_LENGTH) */
  DEFAULT_MAX_CONTENT_LENGTH: 5000,
} as const;

// ============================================================================
// Cache Configuration
// ============================================================================

export const CACHE_CONFIG = {
  RESEARCH_KEY_PREFIX: 'research',
} as const;

// ============================================================================
// Load-time Validation
// ============================================================================

function validateConfiguration(): void {
  const { TEMPERATURE, TIMEOUT_MS } = AGENT_CONFIG;
  check(TEMPERATURE >= 0 && TEMPERATURE <= 2, `AGENT_CONFIG.TEMPERATURE must be between 0 and 2 (got ${TEMPERATURE})`);
  positive(TIMEOUT_MS, 'AGENT_CONFIG.TIMEOUT_MS');
  positive(WRITER_CONFIG.DEFAULT_WORD_COUNT, 'WRITER_CONFIG.DEFAULT_WORD_COUNT');
  positive(WRITER_CONFIG.DEFAULT_SECTION_LENGTH, 'WRITER_CONFIG.DEFAULT_SECTION_LENGTH');
  positive(RETRY_CONFIG.INITIAL_DELAY_MS, 'RETRY_CONFIG.INITIAL_DELAY_MS');
  check(
    RETRY_CONFIG.INITIAL_DELAY_MS <= RETRY_CONFIG.MAX_DELAY_MS,
    'RETRY_CONFIG.INITIAL_DELAY_MS cannot be greater than RETRY_CONFIG.MAX_DELAY_MS'
  );
  positive(PIPELINE_CONFIG.DEFAULT_TIMEOUT_MS, 'PIPELINE_CONFIG.DEFAULT_TIMEOUT_MS');
  positive(PIPELINE_CONFIG.DEFAULT_MAX_CONTENT_LENGTH, 'PIPELINE_CONFIG.DEFAULT_MAX_CONTENT_LENGTH');
  for (const [name, value] of Object.entries(CREATIVE_CONFIG)) {
    positive(value, `CREATIVE_CONFIG.${name}`);
  }
}

validateConfiguration();
