import type { ExtractionResult } from "@metrics-extractor/shared";

export const ExitCode = {
  OK: 0,
  UNEXPECTED: 1,
  CONFIG: 2,
  PARTIAL: 3,
  FAILED: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** 0 when every metric is ok, 3 when some are, 4 when none are */
export function exitCodeFor(result: ExtractionResult): ExitCode {
  const ok = result.outcomes.filter((o) => o.status.state === "ok").length;
  if (ok === result.outcomes.length && !result.cancelled) return ExitCode.OK;
  return ok > 0 ? ExitCode.PARTIAL : ExitCode.FAILED;
}
