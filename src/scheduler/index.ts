/**
 * Scheduler Module
 * Periodic task runner used for profile autosave
 */

export { Scheduler } from './scheduler';
export type { ScheduledTask, TaskRegistration } from './scheduler';

// Tasks
export { createAutosaveTask } from './tasks/autosave';
export type { AutosaveConfig, AutosaveTarget } from './tasks/autosave';
