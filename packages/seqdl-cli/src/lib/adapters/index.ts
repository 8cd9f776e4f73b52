export { systemClock } from "./system-clock.js";
export { realDelay } from "./real-timers.js";
export { createProcessSignalHandler } from "./process-signals.js";
export { createFetchDownloadService } from "./fetch-download.js";
