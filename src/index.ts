/**
 * SupportFlow - Deterministic Conversation Engine
 *
 * Keyword-driven customer-support dialogue: prefix completion, synonym
 * canonicalization, a menu state machine with back/reset navigation and
 * weighted next-action suggestions.
 *
 * @packageDocumentation
 * @module supportflow
 */

// Export all types
export * from './types/index.js';

// Export all utilities
export * from './utils/index.js';

// Export core engine
export * from './core/index.js';

// Export direct-answer providers
export * from './features/index.js';
