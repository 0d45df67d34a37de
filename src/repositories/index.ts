/**
 * Repositories barrel export
 */

// Base
export { BaseRepository, RepositoryError, UNIQUE_VIOLATION } from './BaseRepository';

// Account storage
export { DuplicateAccountError, type AccountStore, type CreateAccountInput } from './AccountStore';
export { AccountRepository } from './AccountRepository';
export { InMemoryAccountStore } from './InMemoryAccountStore';
