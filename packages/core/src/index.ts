/**
 * @newsletter/core - Newsletter subscription domain
 *
 * Request parsing, verification codes, remote subscription calls, status
 * notifications and the orchestrator that ties them together. Transports
 * and hosts live outside this package and plug in through interfaces.
 */

export * from './requests/index.js';
export * from './verification/index.js';
export * from './subscriptions/index.js';
export * from './notifications/index.js';
export * from './newsletter/index.js';
