// Index file for scheduler module

export { RequestScheduler } from "./request-scheduler.ts";
export type { SchedulerStats } from "./request-scheduler.ts";
