/**
 * backend/test/setup-env.ts
 *
 * WHY:
 * - Specs build the app from an explicit AppConfig (see helpers/build-test-app.ts),
 *   but the logger reads its level at import time.
 * - Keep test output quiet unless a run asks for more.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
