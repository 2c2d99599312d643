export type HintDeliveryFailure =
  | "unknown_discoverer"
  | "round_not_prepared"
  | "tier_unavailable";

const MESSAGES: Readonly<Record<HintDeliveryFailure, string>> = {
  unknown_discoverer: "Unknown discoverer",
  round_not_prepared: "Round not prepared",
  tier_unavailable: "Requested tier not available",
};

export class HintDeliveryError extends Error {
  constructor(public readonly code: HintDeliveryFailure) {
    super(MESSAGES[code]);
    this.name = "HintDeliveryError";
  }
}
