export { GameCommandInputError } from "./GameCommandInputError.js";
export { GAME_ERROR_CODES, GameRuleError } from "./GameRuleError.js";
export type { GameErrorCode, WireError } from "./GameRuleError.js";
export { InvalidGameStateError } from "./InvalidGameStateError.js";
export { ProtocolError } from "./ProtocolError.js";
