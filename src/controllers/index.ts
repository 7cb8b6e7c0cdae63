/**
 * Controllers module
 * One controller per group of menu commands
 */

export { PlaybackController } from "./PlaybackController";
export { SearchController } from "./SearchController";
export { LibraryController } from "./LibraryController";
export { NowPlayingController } from "./NowPlayingController";
