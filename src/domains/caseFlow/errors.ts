export type ConfigurationErrorCode =
  | 'CASE_FLOW_CATALOG_INVALID'
  | 'CASE_FLOW_COLUMNS_UNRESOLVED'
  | 'CASE_FLOW_CASE_ID_COLUMN_MISSING'
  | 'CASE_FLOW_NO_LOCATION_COLUMNS'
  | 'CASE_FLOW_RANGE_INVALID'
  | 'CASE_FLOW_OPTIONS_INVALID'
  | 'CASE_FLOW_SOURCE_INVALID';

export class ConfigurationError extends Error {
  code: ConfigurationErrorCode;
  details?: Record<string, unknown>;

  constructor(code: ConfigurationErrorCode, message: string, details?: Record<string, unknown>) {
    super(code);
    this.name = 'ConfigurationError';
    this.code = code;
    this.details = { message, ...details };
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
