/**
 * Conversation commands and betting constants shared across the application.
 */

// Commands (matched after trimming and lower-casing the inbound text)
export const START_COMMAND = 'start';
export const ACCOUNT_COMMAND = 'my account';
export const EXIT_COMMAND = 'exit';
export const BET_COMMAND = 'bet';

// Account creation
export const REFERRAL_CODE_MAX_ATTEMPTS = 5;

// Redis key prefixes
export const CONVERSATION_STATE_PREFIX = 'conversation-state';
export const CONVERSATION_LOCK_PREFIX = 'conversation-lock';
export const INBOUND_DEDUPE_PREFIX = 'inbound-message';

// Outbound queue
export const OUTBOUND_QUEUE_NAME = 'outbound-messages';
