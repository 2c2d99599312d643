export { GameCommandInputError } from "./GameCommandInputError.js";
export { HintDeliveryError, type HintDeliveryFailure } from "./HintDeliveryError.js";
export { HintDestroyError, type HintDestroyFailure } from "./HintDestroyError.js";
export { SessionNotFoundError } from "./SessionNotFoundError.js";
export { TimeoutError } from "./TimeoutError.js";
