export { loadLibvlc } from "./library";
export type { LoadLibvlcOptions } from "./library";
export { candidatePaths, locateLibrary } from "./locate";
export type { LocateOptions } from "./locate";
export { openMedialink } from "./open";
export type { MedialinkSession, OpenMedialinkOptions } from "./open";
