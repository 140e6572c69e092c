/**
 * @rigkeeper/supervisor -- keeps one worker process alive and productive.
 *
 * Health probing, process launch and tree kill, the restart policy and the
 * supervision loop that ties them together.
 */

export * from './parsers.js';
export * from './health-prober.js';
export * from './process-controller.js';
export * from './restart-policy.js';
export * from './cold-start.js';
export * from './keeper.js';
