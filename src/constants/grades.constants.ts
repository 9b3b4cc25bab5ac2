/**
 * Feed grades, best first. Anything the feed sends outside this list ranks below "D".
 */
export const GRADE_ORDER = ["A+", "A", "B", "C", "D"] as const;

export type Grade = (typeof GRADE_ORDER)[number];

const GRADE_LABELS: readonly string[] = GRADE_ORDER;

/**
 * Believed win probability per grade, used when a candidate carries no probability of its own.
 */
export const GRADE_PROB_DEFAULTS: Readonly<Record<Grade, number>> = {
  "A+": 0.6,
  A: 0.57,
  B: 0.54,
  C: 0.52,
  D: 0.5,
};

export function isGrade(value: string): value is Grade {
  return GRADE_LABELS.includes(value);
}

/**
 * Higher is better. Unknown labels rank -1.
 */
export function gradeRank(label: string): number {
  const idx = GRADE_LABELS.indexOf(label.trim().toUpperCase());
  return idx < 0 ? -1 : GRADE_ORDER.length - idx;
}

export function meetsMinGrade(label: string, minGrade: Grade): boolean {
  const rank = gradeRank(label);
  return rank >= 0 && rank >= gradeRank(minGrade);
}

export function defaultProbabilityForGrade(label: string): number {
  const normalized = label.trim().toUpperCase();
  return isGrade(normalized) ? GRADE_PROB_DEFAULTS[normalized] : 0.5;
}

export const BOT_USER_AGENT = "signal-dispatch-bot/1.0 (+node)";
