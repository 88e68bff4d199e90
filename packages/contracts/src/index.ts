// Earshot Contracts
// Shared type-level contracts for the Agent and its clients
//
// RULES:
// - No logic
// - No helpers
// - Only DTOs, event schemas, request/response shapes
// - If something needs logic, it lives in the agent, not here

export * from './events/index.js';
export * from './session/index.js';
