export { buildTrainerCards, type TrainerCard } from './cards.js';
export {
  TrainerSession,
  type TrainerAttemptResult,
  type TrainerAttemptStatus,
  type TrainerTarget,
} from './session.js';
export { checkMove, verifyMove, withDefaultPromotion, type MoveCheck, type MoveVerdict } from './verify.js';
