export type RulesetErrorCode =
  | 'MULTI_CLAUSE_RULE'
  | 'INVALID_RULESET'
  | 'INVALID_DATASET'
  | 'INVALID_CONFIG'
  | 'FILE_NOT_FOUND';

export class RulesetError extends Error {
  readonly code: RulesetErrorCode;

  constructor(code: RulesetErrorCode, message: string) {
    super(`${code}: ${message}`);
    this.name = 'RulesetError';
    this.code = code;
  }
}
