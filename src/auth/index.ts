// ============================================================================
// Auth Module — Barrel Export
// ============================================================================

export { AccessSession } from './session.js';
export type { SessionProvider } from './session.js';
export { CredentialManager } from './credential-manager.js';
export type { CredentialManagerOptions } from './credential-manager.js';
