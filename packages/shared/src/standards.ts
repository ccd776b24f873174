export const JSON_LOG_STANDARD = {
  format: 'json',
  requiredFields: [
    'timestamp',
    'level',
    'service',
    'message',
    'correlationId',
  ],
  optionalTraceFields: [
    'userId',
    'assetName',
    'route',
    'metadata',
    'error',
  ],
} as const;

export const CORRELATION_ID_HEADER = 'x-correlation-id';
