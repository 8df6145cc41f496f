export * from "./types/subtitle";
export * from "./types/engine";
export * from "./config";
export * from "./errors";
export * from "./utils/sentences";
export * from "./utils/durations";
export * from "./utils/srt";
export * from "./utils/wrap";
export * from "./utils/timeline";
export * from "./utils/podcast-script";
export * from "./utils/audio-duration";
export * from "./synthesis/synthesize";
export * from "./utils/mp3-duration";
