export type RankingConfigurationErrorCode = 'MISSING_CLASSIFICATION_COLUMN';

export class RankingConfigurationError extends Error {
  readonly code: RankingConfigurationErrorCode;

  constructor(code: RankingConfigurationErrorCode, message: string) {
    super(message);
    this.name = 'RankingConfigurationError';
    this.code = code;
  }
}
