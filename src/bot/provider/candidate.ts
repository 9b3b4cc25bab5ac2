import { defaultProbabilityForGrade } from "../../constants/grades.constants";
import type { Opportunity, OutcomeSide } from "../types";
import { parseEventTimeMs } from "../utils/event-time";

export type CandidateParseResult =
  | { ok: true; opportunity: Opportunity }
  | { ok: false; reason: string };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readString = (value: unknown): string | undefined => {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed || undefined;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
};

const readNumber = (value: unknown): number | undefined => {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

const readSide = (value: unknown): OutcomeSide | undefined => {
  const text = readString(value)?.toUpperCase();
  return text === "A" || text === "B" ? text : undefined;
};

const sideLabel = (side: unknown): string | undefined =>
  isRecord(side) ? readString(side.label) : undefined;

export const opportunityIdentity = (conditionId: string, side: OutcomeSide): string =>
  `${conditionId}:${side}`;

/**
 * Turn one feed record `{ entry, grade }` into an {@link Opportunity}.
 * `fetchedAt` stands in for the discovery time when the record carries none.
 */
export function parseCandidate(raw: unknown, fetchedAt: number): CandidateParseResult {
  if (!isRecord(raw)) return { ok: false, reason: "not_an_object" };
  const entry = isRecord(raw.entry) ? raw.entry : {};
  const grade = isRecord(raw.grade) ? raw.grade : {};

  const conditionId = readString(entry.conditionId);
  if (!conditionId) return { ok: false, reason: "missing_condition_id" };

  const side = readSide(entry.sharpSide);
  if (!side) return { ok: false, reason: "missing_side" };

  const price = readNumber(entry.sharpSidePrice);
  if (price === undefined) return { ok: false, reason: "missing_price" };
  if (price <= 0 || price >= 1) return { ok: false, reason: "invalid_price" };

  const gradeLabel = readString(grade.grade) ?? "D";
  const suppliedProb = readNumber(grade.trueProb ?? grade.probability ?? entry.trueProb);
  const trueProb =
    suppliedProb !== undefined && suppliedProb > 0 && suppliedProb < 1
      ? suppliedProb
      : defaultProbabilityForGrade(gradeLabel);

  const discoveredAt =
    parseEventTimeMs(entry.discoveredAt ?? entry.detectedAt ?? entry.timestamp ?? entry.createdAt) ??
    fetchedAt;

  const labelA = sideLabel(entry.sideA);
  const labelB = sideLabel(entry.sideB);
  const warnings = Array.isArray(grade.warnings)
    ? grade.warnings.filter((w): w is string => typeof w === "string")
    : undefined;

  return {
    ok: true,
    opportunity: {
      identity: opportunityIdentity(conditionId, side),
      conditionId,
      side,
      grade: gradeLabel,
      price,
      trueProb,
      eventTime: parseEventTimeMs(entry.eventTime),
      discoveredAt,
      marketTitle: readString(entry.marketTitle),
      eventLabel: readString(entry.eventTitle) ?? readString(entry.eventSlug) ?? readString(entry.marketSlug),
      sideLabel: side === "A" ? labelA : labelB,
      otherSideLabel: side === "A" ? labelB : labelA,
      signalScore: readNumber(grade.signalScore),
      edgeRating: readNumber(grade.edgeRating ?? entry.edgeRating),
      warnings,
    },
  };
}
