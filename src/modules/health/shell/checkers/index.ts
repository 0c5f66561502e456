/**
 * Health checker factories
 */

export { makeProbeChecker, type ProbeCheckerOptions } from './probe-checker.js';
export { makeCheckProvider, type CheckProviderOptions } from './check-provider.js';
