export type { TimerService, DelayFn } from "./timer.js";
export type { HttpClient, ResourceMetadata, StreamedResponse } from "./http.js";
