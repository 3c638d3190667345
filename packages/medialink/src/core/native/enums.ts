/** Native event kinds. Values are fixed by the native ABI. */
export enum EventType {
    MediaMetaChanged = 0,
    MediaSubItemAdded = 1,
    MediaDurationChanged = 2,
    MediaParsedChanged = 3,
    MediaFreed = 4,
    MediaStateChanged = 5,
    MediaSubItemTreeAdded = 6,

    MediaListItemAdded = 0x200,
    MediaListWillAddItem = 0x201,
    MediaListItemDeleted = 0x202,
    MediaListWillDeleteItem = 0x203,
    MediaListEndReached = 0x204,

    MediaDiscovererStarted = 0x500,
    MediaDiscovererEnded = 0x501,
}

export enum MediaState {
    NothingSpecial = 0,
    Opening = 1,
    Buffering = 2,
    Playing = 3,
    Paused = 4,
    Stopped = 5,
    Ended = 6,
    Error = 7,
}

export enum MetaType {
    Title = 0,
    Artist = 1,
    Genre = 2,
    Copyright = 3,
    Album = 4,
    TrackNumber = 5,
    Description = 6,
    Rating = 7,
    Date = 8,
    Setting = 9,
    URL = 10,
    Language = 11,
    NowPlaying = 12,
    Publisher = 13,
    EncodedBy = 14,
    ArtworkURL = 15,
    TrackID = 16,
    TrackTotal = 17,
    Director = 18,
    Season = 19,
    Episode = 20,
    ShowName = 21,
    Actors = 22,
    AlbumArtist = 23,
    DiscNumber = 24,
    DiscTotal = 25,
}

export enum TrackType {
    Unknown = -1,
    Audio = 0,
    Video = 1,
    Text = 2,
}

export enum ParsedStatus {
    Skipped = 1,
    Failed = 2,
    Timeout = 3,
    Done = 4,
}

export enum MediaOptionFlag {
    Trusted = 0x2,
    Unique = 0x100,
}

/** Severity of messages emitted by the native library's own logger. */
export enum NativeLogLevel {
    Debug = 0,
    Notice = 2,
    Warning = 3,
    Error = 4,
}
