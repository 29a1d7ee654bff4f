export const QUIZ_DEFAULTS = {
  THRESHOLD: 90,
  QUESTION_THRESHOLD: 100,
  POINTS: 1,
  NUM_CHOICES: 5,
  FIELD_PREFIX: "q",
  STATE_FIELD: "state",
  COUNT_FIELD: "count",
} as const;

export const CODE_GENERATION = {
  MAX_ATTEMPTS: 10_000,
  RANDOM_BITS: 128,
  // 2^61 - 1
  MODULUS: (1n << 61n) - 1n,
} as const;

export const FUZZY = {
  acceptFullAt: 0.85,
  acceptPartialAt: 0.6,
};
