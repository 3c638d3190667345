import {
    type AudioOutputDescription,
    type AudioOutputDeviceDescription,
    type EventManagerPtr,
    type EventType,
    guardLogger,
    type InstancePtr,
    LibraryLoadError,
    type LoggerContext,
    type MediaDiscovererPtr,
    type MediaListPtr,
    type MediaPtr,
    MediaState,
    type MediaStats,
    type MediaTrack,
    type MetaType,
    type ModuleDescription,
    type NativeEventCallback,
    type NativeLibrary,
    type NativeLogCallback,
    NativeLogLevel,
    type NativePointer,
    silentLogger,
    TrackType,
} from "@medialink/core";
import koffi from "koffi";
import { decodeEvent, type EventPayloadReader } from "./events";
import { asBoolean, asNumber, asPointer, asString, enumMember } from "./values";

type KoffiLibrary = ReturnType<typeof koffi.load>;
type KoffiFunction = ReturnType<KoffiLibrary["func"]>;
type RegisteredCallback = ReturnType<typeof koffi.register>;
type KoffiStruct = ReturnType<typeof koffi.struct>;

// ============================================================================
// ABI
// ============================================================================

const EventCallbackProto = koffi.proto("void libvlc_callback_t(const void *event, void *data)");
const ExitCallbackProto = koffi.proto("void libvlc_exit_cb(void *data)");
const LogCallbackProto = koffi.proto(
    "void libvlc_log_cb(void *data, int level, const void *ctx, void *fmt, void *args)",
);

/** Leading members of `libvlc_event_t`; the payload union starts at its size. */
const EventHead = koffi.struct("libvlc_event_head", { type: "int", p_obj: "void *" });

const ModuleDescriptionStruct = koffi.struct("libvlc_module_description_t", {
    psz_name: "str",
    psz_shortname: "str",
    psz_longname: "str",
    psz_help: "str",
    p_next: "void *",
});

const AudioOutputStruct = koffi.struct("libvlc_audio_output_t", {
    psz_name: "str",
    psz_description: "str",
    p_next: "void *",
});

const AudioOutputDeviceStruct = koffi.struct("libvlc_audio_output_device_t", {
    p_next: "void *",
    psz_device: "str",
    psz_description: "str",
});

const StatsStruct = koffi.struct("libvlc_media_stats_t", {
    i_read_bytes: "int",
    f_input_bitrate: "float",
    i_demux_read_bytes: "int",
    f_demux_bitrate: "float",
    i_demux_corrupted: "int",
    i_demux_discontinuity: "int",
    i_decoded_video: "int",
    i_decoded_audio: "int",
    i_displayed_pictures: "int",
    i_lost_pictures: "int",
    i_played_abuffers: "int",
    i_lost_abuffers: "int",
    i_sent_packets: "int",
    i_sent_bytes: "int",
    f_send_bitrate: "float",
});

const TrackStruct = koffi.struct("libvlc_media_track_t", {
    i_codec: "uint32_t",
    i_original_fourcc: "uint32_t",
    i_id: "int",
    i_type: "int",
    i_profile: "int",
    i_level: "int",
    details: "void *",
    i_bitrate: "unsigned int",
    psz_language: "str",
    psz_description: "str",
});

const AudioTrackStruct = koffi.struct("libvlc_audio_track_t", {
    i_channels: "unsigned int",
    i_rate: "unsigned int",
});

const VideoTrackStruct = koffi.struct("libvlc_video_track_t", {
    i_height: "unsigned int",
    i_width: "unsigned int",
    i_sar_num: "unsigned int",
    i_sar_den: "unsigned int",
    i_frame_rate_num: "unsigned int",
    i_frame_rate_den: "unsigned int",
});

const SubtitleTrackStruct = koffi.struct("libvlc_subtitle_track_t", { psz_encoding: "str" });

const LOG_LINE_BYTES = 1024;

const TRACK_TYPES = Object.values(TrackType);
const MEDIA_STATES = Object.values(MediaState);
const NATIVE_LOG_LEVELS = Object.values(NativeLogLevel);

function libcFormatter(): { path: string; symbol: string } {
    switch (process.platform) {
        case "win32":
            return { path: "msvcrt.dll", symbol: "_vsnprintf" };
        case "darwin":
            return { path: "libSystem.B.dylib", symbol: "vsnprintf" };
        default:
            return { path: "libc.so.6", symbol: "vsnprintf" };
    }
}

function field(record: unknown, key: string): unknown {
    return typeof record === "object" && record !== null ? Reflect.get(record, key) : undefined;
}

function intField(record: unknown, key: string): number {
    return asNumber(field(record, key), key);
}

function strField(record: unknown, key: string): string {
    return asString(field(record, key)) ?? "";
}

/** Follow a `p_next` chain, decoding each node with `map`. */
function walkList<T>(head: NativePointer | null, struct: KoffiStruct, map: (node: unknown) => T): T[] {
    const items: T[] = [];
    let cursor = head;
    while (cursor) {
        const node: unknown = koffi.decode(cursor, struct);
        items.push(map(node));
        cursor = asPointer(field(node, "p_next"));
    }
    return items;
}

// ============================================================================
// Bindings
// ============================================================================

function bind(lib: KoffiLibrary) {
    const free = lib.func("void libvlc_free(void *ptr)");
    const OwnedString = koffi.disposable("libvlc_owned_str", "str", free);

    return {
        eventAttach: lib.func("libvlc_event_attach", "int", [
            "void *",
            "int",
            koffi.pointer(EventCallbackProto),
            "void *",
        ]),
        eventDetach: lib.func("libvlc_event_detach", "void", [
            "void *",
            "int",
            koffi.pointer(EventCallbackProto),
            "void *",
        ]),
        eventTypeName: lib.func("const char *libvlc_event_type_name(int type)"),

        new: lib.func("void *libvlc_new(int argc, const char **argv)"),
        retain: lib.func("void libvlc_retain(void *instance)"),
        release: lib.func("void libvlc_release(void *instance)"),
        addIntf: lib.func("int libvlc_add_intf(void *instance, const char *name)"),
        setExitHandler: lib.func("libvlc_set_exit_handler", "void", [
            "void *",
            koffi.pointer(ExitCallbackProto),
            "void *",
        ]),
        setUserAgent: lib.func("void libvlc_set_user_agent(void *instance, const char *name, const char *http)"),
        setAppId: lib.func(
            "void libvlc_set_app_id(void *instance, const char *id, const char *version, const char *icon)",
        ),
        logSet: lib.func("libvlc_log_set", "void", ["void *", koffi.pointer(LogCallbackProto), "void *"]),
        logUnset: lib.func("void libvlc_log_unset(void *instance)"),
        logGetContext: lib.func("libvlc_log_get_context", "void", [
            "const void *",
            koffi.out(koffi.pointer("const char *")),
            koffi.out(koffi.pointer("const char *")),
            koffi.out(koffi.pointer("unsigned int")),
        ]),
        audioFilterListGet: lib.func("void *libvlc_audio_filter_list_get(void *instance)"),
        videoFilterListGet: lib.func("void *libvlc_video_filter_list_get(void *instance)"),
        moduleDescriptionListRelease: lib.func("void libvlc_module_description_list_release(void *list)"),
        audioOutputListGet: lib.func("void *libvlc_audio_output_list_get(void *instance)"),
        audioOutputListRelease: lib.func("void libvlc_audio_output_list_release(void *list)"),
        audioOutputDeviceListGet: lib.func(
            "void *libvlc_audio_output_device_list_get(void *instance, const char *aout)",
        ),
        audioOutputDeviceListRelease: lib.func("void libvlc_audio_output_device_list_release(void *list)"),

        mediaNewLocation: lib.func("void *libvlc_media_new_location(void *instance, const char *mrl)"),
        mediaNewPath: lib.func("void *libvlc_media_new_path(void *instance, const char *path)"),
        mediaNewAsNode: lib.func("void *libvlc_media_new_as_node(void *instance, const char *name)"),
        mediaNewFd: lib.func("void *libvlc_media_new_fd(void *instance, int fd)"),
        mediaRetain: lib.func("void libvlc_media_retain(void *md)"),
        mediaRelease: lib.func("void libvlc_media_release(void *md)"),
        mediaDuplicate: lib.func("void *libvlc_media_duplicate(void *md)"),
        mediaAddOption: lib.func("void libvlc_media_add_option(void *md, const char *option)"),
        mediaAddOptionFlag: lib.func(
            "void libvlc_media_add_option_flag(void *md, const char *option, unsigned int flags)",
        ),
        mediaGetMrl: lib.func("libvlc_media_get_mrl", OwnedString, ["void *"]),
        mediaGetMeta: lib.func("libvlc_media_get_meta", OwnedString, ["void *", "int"]),
        mediaSetMeta: lib.func("void libvlc_media_set_meta(void *md, int meta, const char *value)"),
        mediaSaveMeta: lib.func("int libvlc_media_save_meta(void *md)"),
        mediaGetState: lib.func("int libvlc_media_get_state(void *md)"),
        mediaGetStats: lib.func("libvlc_media_get_stats", "int", ["void *", koffi.out(koffi.pointer(StatsStruct))]),
        mediaGetDuration: lib.func("int64_t libvlc_media_get_duration(void *md)"),
        mediaParse: lib.func("void libvlc_media_parse(void *md)"),
        mediaParseAsync: lib.func("void libvlc_media_parse_async(void *md)"),
        mediaIsParsed: lib.func("int libvlc_media_is_parsed(void *md)"),
        mediaTracksGet: lib.func("unsigned int libvlc_media_tracks_get(void *md, _Out_ void **tracks)"),
        mediaTracksRelease: lib.func("void libvlc_media_tracks_release(void *tracks, unsigned int count)"),
        mediaEventManager: lib.func("void *libvlc_media_event_manager(void *md)"),

        mediaListNew: lib.func("void *libvlc_media_list_new(void *instance)"),
        mediaListRetain: lib.func("void libvlc_media_list_retain(void *list)"),
        mediaListRelease: lib.func("void libvlc_media_list_release(void *list)"),
        mediaListMedia: lib.func("void *libvlc_media_list_media(void *list)"),
        mediaListCount: lib.func("int libvlc_media_list_count(void *list)"),
        mediaListAddMedia: lib.func("int libvlc_media_list_add_media(void *list, void *md)"),
        mediaListItemAtIndex: lib.func("void *libvlc_media_list_item_at_index(void *list, int index)"),
        mediaListLock: lib.func("void libvlc_media_list_lock(void *list)"),
        mediaListUnlock: lib.func("void libvlc_media_list_unlock(void *list)"),
        mediaListEventManager: lib.func("void *libvlc_media_list_event_manager(void *list)"),

        discovererNew: lib.func("void *libvlc_media_discoverer_new(void *instance, const char *name)"),
        discovererRelease: lib.func("void libvlc_media_discoverer_release(void *discoverer)"),
        discovererStart: lib.func("int libvlc_media_discoverer_start(void *discoverer)"),
        discovererStop: lib.func("void libvlc_media_discoverer_stop(void *discoverer)"),
        discovererLocalizedName: lib.func("libvlc_media_discoverer_localized_name", OwnedString, ["void *"]),
        discovererIsRunning: lib.func("int libvlc_media_discoverer_is_running(void *discoverer)"),
        discovererMediaList: lib.func("void *libvlc_media_discoverer_media_list(void *discoverer)"),
        discovererEventManager: lib.func("void *libvlc_media_discoverer_event_manager(void *discoverer)"),
    } satisfies Record<string, KoffiFunction>;
}

type Bindings = ReturnType<typeof bind>;

export type LoadLibvlcOptions = {
    /** Receives failures raised inside native callbacks, which cannot propagate. */
    logger?: LoggerContext;
};

// ============================================================================
// NativeLibrary over koffi
// ============================================================================

type EventRegistration = { registered: RegisteredCallback; attachments: number };

class KoffiNativeLibrary implements NativeLibrary {
    private readonly eventCallbacks = new Map<NativeEventCallback, EventRegistration>();
    private readonly exitHandlers = new Map<bigint, RegisteredCallback>();
    private readonly logCallbacks = new Map<bigint, RegisteredCallback>();
    private readonly payloadOffset = koffi.sizeof(EventHead);
    private readonly pointerSize = koffi.sizeof("void *");

    constructor(
        private readonly fn: Bindings,
        private readonly vsnprintf: KoffiFunction,
        private readonly logger: LoggerContext,
    ) {}

    addressOf(ptr: NativePointer): bigint {
        const address: unknown = koffi.address(ptr);
        return typeof address === "bigint" ? address : BigInt(asNumber(address, "address"));
    }

    // ── Events ──────────────────────────────────────────────────────

    eventAttach(em: EventManagerPtr, type: EventType, callback: NativeEventCallback): number {
        const registration = this.eventCallbacks.get(callback) ?? {
            registered: koffi.register(
                (event: unknown) => this.deliver(event, callback),
                koffi.pointer(EventCallbackProto),
            ),
            attachments: 0,
        };
        const status = asNumber(this.fn.eventAttach(em, type, registration.registered, null), "libvlc_event_attach");
        if (status === 0) {
            registration.attachments++;
            this.eventCallbacks.set(callback, registration);
        } else if (registration.attachments === 0) {
            koffi.unregister(registration.registered);
        }
        return status;
    }

    eventDetach(em: EventManagerPtr, type: EventType, callback: NativeEventCallback): void {
        const registration = this.eventCallbacks.get(callback);
        if (!registration) return;
        this.fn.eventDetach(em, type, registration.registered, null);
        registration.attachments--;
        if (registration.attachments === 0) {
            this.eventCallbacks.delete(callback);
            koffi.unregister(registration.registered);
        }
    }

    eventTypeName(type: EventType): string {
        return asString(this.fn.eventTypeName(type)) ?? `event ${type}`;
    }

    private deliver(eventPtr: unknown, callback: NativeEventCallback): void {
        try {
            const ptr = asPointer(eventPtr);
            if (!ptr) return;
            const rawType = asNumber(koffi.decode(ptr, "int"), "event type");
            const event = decodeEvent(rawType, this.payloadReader(ptr));
            if (event === null) {
                this.logger.debug("Native", "dropped an event it cannot decode", { type: rawType });
                return;
            }
            callback(event);
        } catch (error) {
            this.logger.error("Native", "event callback failed", { error });
        }
    }

    private payloadReader(ptr: NativePointer): EventPayloadReader {
        const base = this.payloadOffset;
        return {
            pointerSize: this.pointerSize,
            int: (offset) => asNumber(koffi.decode(ptr, base + offset, "int"), "event field"),
            int64: (offset) => asNumber(koffi.decode(ptr, base + offset, "int64_t"), "event field"),
            pointer: (offset) => asPointer(koffi.decode(ptr, base + offset, "void *")),
        };
    }

    // ── Instance ────────────────────────────────────────────────────

    instanceNew(args: readonly string[]): InstancePtr | null {
        return asPointer(this.fn.new(args.length, args.length > 0 ? [...args] : null));
    }

    instanceRetain(instance: InstancePtr): void {
        this.fn.retain(instance);
    }

    instanceRelease(instance: InstancePtr): void {
        this.fn.release(instance);
    }

    addIntf(instance: InstancePtr, name: string | null): number {
        return asNumber(this.fn.addIntf(instance, name), "libvlc_add_intf");
    }

    setExitHandler(instance: InstancePtr, handler: (() => void) | null): void {
        const key = this.addressOf(instance);
        const previous = this.exitHandlers.get(key);
        if (handler === null) {
            this.fn.setExitHandler(instance, null, null);
            this.exitHandlers.delete(key);
        } else {
            const registered = koffi.register(handler, koffi.pointer(ExitCallbackProto));
            this.fn.setExitHandler(instance, registered, null);
            this.exitHandlers.set(key, registered);
        }
        if (previous) koffi.unregister(previous);
    }

    setUserAgent(instance: InstancePtr, name: string, http: string): void {
        this.fn.setUserAgent(instance, name, http);
    }

    setAppId(instance: InstancePtr, id: string, version: string, icon: string): void {
        this.fn.setAppId(instance, id, version, icon);
    }

    logSet(instance: InstancePtr, callback: NativeLogCallback): void {
        const key = this.addressOf(instance);
        const previous = this.logCallbacks.get(key);
        const registered = koffi.register(
            (_data: unknown, level: unknown, ctx: unknown, fmt: unknown, args: unknown) =>
                this.forwardLog(callback, level, ctx, fmt, args),
            koffi.pointer(LogCallbackProto),
        );
        this.fn.logSet(instance, registered, null);
        this.logCallbacks.set(key, registered);
        if (previous) koffi.unregister(previous);
    }

    logUnset(instance: InstancePtr): void {
        const key = this.addressOf(instance);
        this.fn.logUnset(instance);
        const previous = this.logCallbacks.get(key);
        this.logCallbacks.delete(key);
        if (previous) koffi.unregister(previous);
    }

    private forwardLog(callback: NativeLogCallback, level: unknown, ctx: unknown, fmt: unknown, args: unknown): void {
        try {
            const buffer = Buffer.alloc(LOG_LINE_BYTES);
            const written = asNumber(this.vsnprintf(buffer, LOG_LINE_BYTES, fmt, args), "vsnprintf");
            const message = buffer.toString("utf8", 0, Math.max(0, Math.min(written, LOG_LINE_BYTES - 1)));
            const module: unknown[] = [null];
            this.fn.logGetContext(ctx, module, [null], [0]);
            callback({
                level: enumMember(NATIVE_LOG_LEVELS, asNumber(level, "log level")) ?? NativeLogLevel.Debug,
                message,
                module: asString(module[0]),
            });
        } catch (error) {
            this.logger.error("Native", "log callback failed", { error });
        }
    }

    audioFilterList(instance: InstancePtr): ModuleDescription[] | null {
        return this.moduleList(asPointer(this.fn.audioFilterListGet(instance)));
    }

    videoFilterList(instance: InstancePtr): ModuleDescription[] | null {
        return this.moduleList(asPointer(this.fn.videoFilterListGet(instance)));
    }

    private moduleList(head: NativePointer | null): ModuleDescription[] | null {
        if (!head) return null;
        try {
            return walkList(head, ModuleDescriptionStruct, (node) => ({
                name: strField(node, "psz_name"),
                shortName: strField(node, "psz_shortname"),
                longName: strField(node, "psz_longname"),
                help: strField(node, "psz_help"),
            }));
        } finally {
            this.fn.moduleDescriptionListRelease(head);
        }
    }

    audioOutputList(instance: InstancePtr): AudioOutputDescription[] | null {
        const head = asPointer(this.fn.audioOutputListGet(instance));
        if (!head) return null;
        try {
            return walkList(head, AudioOutputStruct, (node) => ({
                name: strField(node, "psz_name"),
                description: strField(node, "psz_description"),
            }));
        } finally {
            this.fn.audioOutputListRelease(head);
        }
    }

    audioOutputDeviceList(instance: InstancePtr, aout: string): AudioOutputDeviceDescription[] | null {
        const head = asPointer(this.fn.audioOutputDeviceListGet(instance, aout));
        if (!head) return null;
        try {
            return walkList(head, AudioOutputDeviceStruct, (node) => ({
                device: strField(node, "psz_device"),
                description: strField(node, "psz_description"),
            }));
        } finally {
            this.fn.audioOutputDeviceListRelease(head);
        }
    }

    // ── Media ───────────────────────────────────────────────────────

    mediaNewLocation(instance: InstancePtr, mrl: string): MediaPtr | null {
        return asPointer(this.fn.mediaNewLocation(instance, mrl));
    }

    mediaNewPath(instance: InstancePtr, path: string): MediaPtr | null {
        return asPointer(this.fn.mediaNewPath(instance, path));
    }

    mediaNewAsNode(instance: InstancePtr, name: string): MediaPtr | null {
        return asPointer(this.fn.mediaNewAsNode(instance, name));
    }

    mediaNewFd(instance: InstancePtr, fd: number): MediaPtr | null {
        return asPointer(this.fn.mediaNewFd(instance, fd));
    }

    mediaRetain(media: MediaPtr): void {
        this.fn.mediaRetain(media);
    }

    mediaRelease(media: MediaPtr): void {
        this.fn.mediaRelease(media);
    }

    mediaDuplicate(media: MediaPtr): MediaPtr | null {
        return asPointer(this.fn.mediaDuplicate(media));
    }

    mediaAddOption(media: MediaPtr, option: string): void {
        this.fn.mediaAddOption(media, option);
    }

    mediaAddOptionFlag(media: MediaPtr, option: string, flags: number): void {
        this.fn.mediaAddOptionFlag(media, option, flags);
    }

    mediaGetMrl(media: MediaPtr): string | null {
        return asString(this.fn.mediaGetMrl(media));
    }

    mediaGetMeta(media: MediaPtr, meta: MetaType): string | null {
        return asString(this.fn.mediaGetMeta(media, meta));
    }

    mediaSetMeta(media: MediaPtr, meta: MetaType, value: string): void {
        this.fn.mediaSetMeta(media, meta, value);
    }

    mediaSaveMeta(media: MediaPtr): number {
        return asNumber(this.fn.mediaSaveMeta(media), "libvlc_media_save_meta");
    }

    mediaGetState(media: MediaPtr): MediaState {
        return enumMember(MEDIA_STATES, asNumber(this.fn.mediaGetState(media), "state")) ?? MediaState.Error;
    }

    mediaGetStats(media: MediaPtr): MediaStats | null {
        const raw: Record<string, unknown> = {};
        if (!asBoolean(this.fn.mediaGetStats(media, raw))) return null;
        return {
            readBytes: intField(raw, "i_read_bytes"),
            inputBitrate: intField(raw, "f_input_bitrate"),
            demuxReadBytes: intField(raw, "i_demux_read_bytes"),
            demuxBitrate: intField(raw, "f_demux_bitrate"),
            demuxCorrupted: intField(raw, "i_demux_corrupted"),
            demuxDiscontinuity: intField(raw, "i_demux_discontinuity"),
            decodedVideo: intField(raw, "i_decoded_video"),
            decodedAudio: intField(raw, "i_decoded_audio"),
            displayedPictures: intField(raw, "i_displayed_pictures"),
            lostPictures: intField(raw, "i_lost_pictures"),
            playedAudioBuffers: intField(raw, "i_played_abuffers"),
            lostAudioBuffers: intField(raw, "i_lost_abuffers"),
            sentPackets: intField(raw, "i_sent_packets"),
            sentBytes: intField(raw, "i_sent_bytes"),
            sendBitrate: intField(raw, "f_send_bitrate"),
        };
    }

    mediaGetDuration(media: MediaPtr): number {
        return asNumber(this.fn.mediaGetDuration(media), "duration");
    }

    mediaParse(media: MediaPtr): void {
        this.fn.mediaParse(media);
    }

    mediaParseAsync(media: MediaPtr): void {
        this.fn.mediaParseAsync(media);
    }

    mediaIsParsed(media: MediaPtr): boolean {
        return asBoolean(this.fn.mediaIsParsed(media));
    }

    mediaTracks(media: MediaPtr): MediaTrack[] {
        const out: unknown[] = [null];
        const count = asNumber(this.fn.mediaTracksGet(media, out), "track count");
        const array = asPointer(out[0]);
        if (count === 0 || !array) return [];
        try {
            const pointers: unknown = koffi.decode(array, koffi.array("void *", count));
            return Array.isArray(pointers) ? pointers.map((ptr) => this.decodeTrack(ptr)) : [];
        } finally {
            this.fn.mediaTracksRelease(array, count);
        }
    }

    private decodeTrack(ptr: unknown): MediaTrack {
        const raw: unknown = koffi.decode(ptr, TrackStruct);
        const type = enumMember(TRACK_TYPES, intField(raw, "i_type")) ?? TrackType.Unknown;
        const track: MediaTrack = {
            codec: intField(raw, "i_codec"),
            originalFourcc: intField(raw, "i_original_fourcc"),
            id: intField(raw, "i_id"),
            type,
            profile: intField(raw, "i_profile"),
            level: intField(raw, "i_level"),
            bitrate: intField(raw, "i_bitrate"),
            language: strField(raw, "psz_language"),
            description: strField(raw, "psz_description"),
        };
        const details = asPointer(field(raw, "details"));
        if (!details) return track;

        switch (type) {
            case TrackType.Audio: {
                const audio: unknown = koffi.decode(details, AudioTrackStruct);
                track.audio = { channels: intField(audio, "i_channels"), rate: intField(audio, "i_rate") };
                break;
            }
            case TrackType.Video: {
                const video: unknown = koffi.decode(details, VideoTrackStruct);
                track.video = {
                    width: intField(video, "i_width"),
                    height: intField(video, "i_height"),
                    sarNum: intField(video, "i_sar_num"),
                    sarDen: intField(video, "i_sar_den"),
                    frameRateNum: intField(video, "i_frame_rate_num"),
                    frameRateDen: intField(video, "i_frame_rate_den"),
                };
                break;
            }
            case TrackType.Text:
                track.subtitle = { encoding: strField(koffi.decode(details, SubtitleTrackStruct), "psz_encoding") };
                break;
            case TrackType.Unknown:
                break;
        }
        return track;
    }

    mediaEventManager(media: MediaPtr): EventManagerPtr {
        return this.eventManagerOf(this.fn.mediaEventManager(media), "media");
    }

    // ── Media list ──────────────────────────────────────────────────

    mediaListNew(instance: InstancePtr): MediaListPtr | null {
        return asPointer(this.fn.mediaListNew(instance));
    }

    mediaListRetain(list: MediaListPtr): void {
        this.fn.mediaListRetain(list);
    }

    mediaListRelease(list: MediaListPtr): void {
        this.fn.mediaListRelease(list);
    }

    mediaListMedia(list: MediaListPtr): MediaPtr | null {
        return asPointer(this.fn.mediaListMedia(list));
    }

    mediaListCount(list: MediaListPtr): number {
        return asNumber(this.fn.mediaListCount(list), "libvlc_media_list_count");
    }

    mediaListAddMedia(list: MediaListPtr, media: MediaPtr): number {
        return asNumber(this.fn.mediaListAddMedia(list, media), "libvlc_media_list_add_media");
    }

    mediaListItemAt(list: MediaListPtr, index: number): MediaPtr | null {
        return asPointer(this.fn.mediaListItemAtIndex(list, index));
    }

    mediaListLock(list: MediaListPtr): void {
        this.fn.mediaListLock(list);
    }

    mediaListUnlock(list: MediaListPtr): void {
        this.fn.mediaListUnlock(list);
    }

    mediaListEventManager(list: MediaListPtr): EventManagerPtr {
        return this.eventManagerOf(this.fn.mediaListEventManager(list), "media list");
    }

    // ── Media discoverer ────────────────────────────────────────────

    mediaDiscovererNew(instance: InstancePtr, name: string): MediaDiscovererPtr | null {
        return asPointer(this.fn.discovererNew(instance, name));
    }

    mediaDiscovererRelease(discoverer: MediaDiscovererPtr): void {
        this.fn.discovererRelease(discoverer);
    }

    mediaDiscovererStart(discoverer: MediaDiscovererPtr): number {
        return asNumber(this.fn.discovererStart(discoverer), "libvlc_media_discoverer_start");
    }

    mediaDiscovererStop(discoverer: MediaDiscovererPtr): void {
        this.fn.discovererStop(discoverer);
    }

    mediaDiscovererLocalizedName(discoverer: MediaDiscovererPtr): string | null {
        return asString(this.fn.discovererLocalizedName(discoverer));
    }

    mediaDiscovererIsRunning(discoverer: MediaDiscovererPtr): boolean {
        return asBoolean(this.fn.discovererIsRunning(discoverer));
    }

    mediaDiscovererMediaList(discoverer: MediaDiscovererPtr): MediaListPtr | null {
        return asPointer(this.fn.discovererMediaList(discoverer));
    }

    mediaDiscovererEventManager(discoverer: MediaDiscovererPtr): EventManagerPtr {
        return this.eventManagerOf(this.fn.discovererEventManager(discoverer), "media discoverer");
    }

    private eventManagerOf(value: unknown, owner: string): EventManagerPtr {
        const em = asPointer(value);
        if (!em) throw new TypeError(`The native ${owner} has no event manager`);
        return em;
    }
}

/**
 * Open the native media library at `path` and bind every entry point the
 * core needs.
 * @throws LibraryLoadError when the file cannot be loaded or a symbol is missing.
 */
export function loadLibvlc(path: string, options: LoadLibvlcOptions = {}): NativeLibrary {
    const formatter = libcFormatter();
    try {
        const lib = koffi.load(path);
        const libc = koffi.load(formatter.path);
        const vsnprintf = libc.func(formatter.symbol, "int", ["void *", "size_t", "void *", "void *"]);
        return new KoffiNativeLibrary(bind(lib), vsnprintf, guardLogger(options.logger ?? silentLogger));
    } catch (error) {
        throw new LibraryLoadError(path, error);
    }
}
