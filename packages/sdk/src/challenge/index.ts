/**
 * Challenge solver module
 */

export {
  solveChallenge,
  findNonce,
  isNonceValid,
  parseTarget,
  type Solution,
  type FindNonceOptions,
  type SolveOptions,
} from './ChallengeSolver';
