// Glimpse Contracts
// Shared type-level contracts for the voice agent and its control surface
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only DTOs, event schemas, request/response shapes
// - If something needs logic, it lives in the agent, not here

export * from './events/index.js';
export * from './protocol/index.js';
export * from './control/index.js';
