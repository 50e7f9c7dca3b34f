export { ContinuousMonitor, DEFAULT_MONITOR_INTERVAL_SECONDS, type TargetScanner } from './monitor.js';
export { MonitorSession, defaultHealthPredicate, type MonitorSessionOptions } from './session.js';
