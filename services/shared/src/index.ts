// Database
export * from './db/client';

// Events and messaging
export * from './events/outbox';
export * from './messaging/client';

// Conversion and valuation
export * from './conversion/conversion-strategy';
export * from './conversion/strategies';
export * from './conversion/unit-conversion-registry';
export * from './valuation/line-valuation';
export * from './valuation/period-aggregator';

// Services
export * from './services/stocktake-service';
export * from './services/period-summary-service';
export * from './services/period-lifecycle-service';
export * from './services/voice-command-adapter';

// Clients
export * from './clients/movement-ledger';

// Types
export * from './types/stocktake.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
export * from './utils/math';
