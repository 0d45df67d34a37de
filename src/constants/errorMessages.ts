/**
 * Error Message Constants
 *
 * Transport-facing error strings. User-facing chat copy lives in
 * services/conversation/messages.ts.
 */

// ============================================================================
// Webhook
// ============================================================================

export const INVALID_SIGNATURE = 'Invalid signature';
export const MISSING_SIGNATURE = 'Missing signature';

// ============================================================================
// Generic Errors
// ============================================================================

export const INTERNAL_ERROR = 'Internal server error';

// ============================================================================
// Conversation
// ============================================================================

export const CONVERSATION_BUSY = 'Conversation is busy, try again shortly';
export const ACCOUNT_CREATION_FAILED = 'Failed to create account';
