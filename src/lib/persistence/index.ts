/**
 * Persistence Module
 *
 * @module persistence
 */

export { InMemorySessionRepository, type SessionRepository } from './SessionRepository';
