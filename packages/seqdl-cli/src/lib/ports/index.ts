export type { Clock } from "./clock.js";
export type { DelayFn } from "./timer.js";
export type { SignalHandler } from "./signal-handler.js";
export type { DownloadService, DownloadRequestOptions, DownloadReceipt } from "./download.js";
