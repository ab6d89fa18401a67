export * from './api/ApiClient';
export * from './api/TelemetrySession';
export * from './api/dynamicValue';
export * from './api/errors';
export * from './api/signature';
export * from './api/types';
export * from './telemetry';
export * from './logger';
