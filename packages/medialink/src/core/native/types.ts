import type { EventType, MediaState, MetaType, NativeLogLevel, ParsedStatus, TrackType } from "./enums";

/**
 * Opaque native pointer. The core never looks inside; identity is resolved
 * through {@link NativeLibrary.addressOf}.
 */
export type NativePointer = object;

export type InstancePtr = NativePointer;
export type MediaPtr = NativePointer;
export type MediaListPtr = NativePointer;
export type MediaDiscovererPtr = NativePointer;
/** Owned by its parent object, never reference counted on its own. */
export type EventManagerPtr = NativePointer;

// ── Events ──────────────────────────────────────────────────────────

export type MediaMetaChangedEvent = { type: EventType.MediaMetaChanged; metaType: MetaType };
export type MediaSubItemAddedEvent = { type: EventType.MediaSubItemAdded; newChild: MediaPtr };
export type MediaDurationChangedEvent = { type: EventType.MediaDurationChanged; newDuration: number };
export type MediaParsedChangedEvent = { type: EventType.MediaParsedChanged; newStatus: ParsedStatus };
export type MediaFreedEvent = { type: EventType.MediaFreed; md: MediaPtr };
export type MediaStateChangedEvent = { type: EventType.MediaStateChanged; newState: MediaState };
export type MediaSubItemTreeAddedEvent = { type: EventType.MediaSubItemTreeAdded; item: MediaPtr };

type MediaListItemPayload = { item: MediaPtr; index: number };

export type MediaListItemAddedEvent = { type: EventType.MediaListItemAdded } & MediaListItemPayload;
export type MediaListWillAddItemEvent = { type: EventType.MediaListWillAddItem } & MediaListItemPayload;
export type MediaListItemDeletedEvent = { type: EventType.MediaListItemDeleted } & MediaListItemPayload;
export type MediaListWillDeleteItemEvent = { type: EventType.MediaListWillDeleteItem } & MediaListItemPayload;
/** Any of the four item notifications of a media list. */
export type MediaListItemEvent =
    | MediaListItemAddedEvent
    | MediaListWillAddItemEvent
    | MediaListItemDeletedEvent
    | MediaListWillDeleteItemEvent;
export type MediaListEndReachedEvent = { type: EventType.MediaListEndReached };

export type MediaDiscovererStartedEvent = { type: EventType.MediaDiscovererStarted };
export type MediaDiscovererEndedEvent = { type: EventType.MediaDiscovererEnded };

/** A native event struct decoded into a discriminated union on `type`. */
export type NativeEvent =
    | MediaMetaChangedEvent
    | MediaSubItemAddedEvent
    | MediaDurationChangedEvent
    | MediaParsedChangedEvent
    | MediaFreedEvent
    | MediaStateChangedEvent
    | MediaSubItemTreeAddedEvent
    | MediaListItemEvent
    | MediaListEndReachedEvent
    | MediaDiscovererStartedEvent
    | MediaDiscovererEndedEvent;

/** Narrow view of {@link NativeEvent} for one event kind. Each member carries exactly one kind. */
export type EventOf<K extends EventType> = Extract<NativeEvent, { type: K }>;

/** Shape of the one callback the native library accepts per (object, event kind). */
export type NativeEventCallback = (event: NativeEvent) => void;

// ── Global callbacks ────────────────────────────────────────────────

export type NativeLogMessage = {
    level: NativeLogLevel;
    message: string;
    module: string | null;
};

export type NativeLogCallback = (message: NativeLogMessage) => void;

// ── Descriptions ────────────────────────────────────────────────────

export type ModuleDescription = {
    name: string;
    shortName: string;
    longName: string;
    help: string;
};

export type AudioOutputDescription = {
    name: string;
    description: string;
};

export type AudioOutputDeviceDescription = {
    device: string;
    description: string;
};

export type MediaStats = {
    readBytes: number;
    inputBitrate: number;
    demuxReadBytes: number;
    demuxBitrate: number;
    demuxCorrupted: number;
    demuxDiscontinuity: number;
    decodedVideo: number;
    decodedAudio: number;
    displayedPictures: number;
    lostPictures: number;
    playedAudioBuffers: number;
    lostAudioBuffers: number;
    sentPackets: number;
    sentBytes: number;
    sendBitrate: number;
};

export type AudioTrackDetails = { channels: number; rate: number };
export type VideoTrackDetails = {
    width: number;
    height: number;
    sarNum: number;
    sarDen: number;
    frameRateNum: number;
    frameRateDen: number;
};
export type SubtitleTrackDetails = { encoding: string };

export type MediaTrack = {
    codec: number;
    originalFourcc: number;
    id: number;
    type: TrackType;
    profile: number;
    level: number;
    bitrate: number;
    language: string;
    description: string;
    audio?: AudioTrackDetails;
    video?: VideoTrackDetails;
    subtitle?: SubtitleTrackDetails;
};

// ── Library contract ────────────────────────────────────────────────

/**
 * Contract between the core and a loaded native media library.
 *
 * Create calls hand over one reference (`null` on failure); getters that
 * return `MediaPtr` from a container also hand over one reference.
 * Attach returns 0 on success.
 */
export interface NativeLibrary {
    addressOf(ptr: NativePointer): bigint;

    // Events
    eventAttach(em: EventManagerPtr, type: EventType, callback: NativeEventCallback): number;
    eventDetach(em: EventManagerPtr, type: EventType, callback: NativeEventCallback): void;
    eventTypeName(type: EventType): string;

    // Instance
    instanceNew(args: readonly string[]): InstancePtr | null;
    instanceRetain(instance: InstancePtr): void;
    instanceRelease(instance: InstancePtr): void;
    addIntf(instance: InstancePtr, name: string | null): number;
    setExitHandler(instance: InstancePtr, handler: (() => void) | null): void;
    setUserAgent(instance: InstancePtr, name: string, http: string): void;
    setAppId(instance: InstancePtr, id: string, version: string, icon: string): void;
    logSet(instance: InstancePtr, callback: NativeLogCallback): void;
    logUnset(instance: InstancePtr): void;
    audioFilterList(instance: InstancePtr): ModuleDescription[] | null;
    videoFilterList(instance: InstancePtr): ModuleDescription[] | null;
    audioOutputList(instance: InstancePtr): AudioOutputDescription[] | null;
    audioOutputDeviceList(instance: InstancePtr, aout: string): AudioOutputDeviceDescription[] | null;

    // Media
    mediaNewLocation(instance: InstancePtr, mrl: string): MediaPtr | null;
    mediaNewPath(instance: InstancePtr, path: string): MediaPtr | null;
    mediaNewAsNode(instance: InstancePtr, name: string): MediaPtr | null;
    mediaNewFd(instance: InstancePtr, fd: number): MediaPtr | null;
    mediaRetain(media: MediaPtr): void;
    mediaRelease(media: MediaPtr): void;
    mediaDuplicate(media: MediaPtr): MediaPtr | null;
    mediaAddOption(media: MediaPtr, option: string): void;
    mediaAddOptionFlag(media: MediaPtr, option: string, flags: number): void;
    mediaGetMrl(media: MediaPtr): string | null;
    mediaGetMeta(media: MediaPtr, meta: MetaType): string | null;
    mediaSetMeta(media: MediaPtr, meta: MetaType, value: string): void;
    mediaSaveMeta(media: MediaPtr): number;
    mediaGetState(media: MediaPtr): MediaState;
    mediaGetStats(media: MediaPtr): MediaStats | null;
    mediaGetDuration(media: MediaPtr): number;
    mediaParse(media: MediaPtr): void;
    mediaParseAsync(media: MediaPtr): void;
    mediaIsParsed(media: MediaPtr): boolean;
    mediaTracks(media: MediaPtr): MediaTrack[];
    mediaEventManager(media: MediaPtr): EventManagerPtr;

    // Media list
    mediaListNew(instance: InstancePtr): MediaListPtr | null;
    mediaListRetain(list: MediaListPtr): void;
    mediaListRelease(list: MediaListPtr): void;
    mediaListMedia(list: MediaListPtr): MediaPtr | null;
    mediaListCount(list: MediaListPtr): number;
    mediaListAddMedia(list: MediaListPtr, media: MediaPtr): number;
    mediaListItemAt(list: MediaListPtr, index: number): MediaPtr | null;
    mediaListLock(list: MediaListPtr): void;
    mediaListUnlock(list: MediaListPtr): void;
    mediaListEventManager(list: MediaListPtr): EventManagerPtr;

    // Media discoverer
    mediaDiscovererNew(instance: InstancePtr, name: string): MediaDiscovererPtr | null;
    mediaDiscovererRelease(discoverer: MediaDiscovererPtr): void;
    mediaDiscovererStart(discoverer: MediaDiscovererPtr): number;
    mediaDiscovererStop(discoverer: MediaDiscovererPtr): void;
    mediaDiscovererLocalizedName(discoverer: MediaDiscovererPtr): string | null;
    mediaDiscovererIsRunning(discoverer: MediaDiscovererPtr): boolean;
    mediaDiscovererMediaList(discoverer: MediaDiscovererPtr): MediaListPtr | null;
    mediaDiscovererEventManager(discoverer: MediaDiscovererPtr): EventManagerPtr;
}
