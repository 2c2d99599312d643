export type HintDestroyFailure =
  | "not_found"
  | "already_destroyed"
  | "not_authorized"
  | "quota_reached";

const MESSAGES: Readonly<Record<HintDestroyFailure, string>> = {
  not_found: "Hint not found",
  already_destroyed: "Hint already destroyed",
  not_authorized: "Only the culprit can destroy hints",
  quota_reached: "Destroy quota reached",
};

export class HintDestroyError extends Error {
  constructor(public readonly code: HintDestroyFailure) {
    super(MESSAGES[code]);
    this.name = "HintDestroyError";
  }
}
