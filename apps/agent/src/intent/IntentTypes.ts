// Intent Types
// Type definitions for keyword classification

export enum IntentKind {
    VISION_TRIGGER = 'vision_trigger',
    CAMERA_OPEN = 'camera_open',
    CAMERA_CLOSE = 'camera_close',
    ORDINARY = 'ordinary',
}

export interface KeywordMatch {
    kind: IntentKind;
    /** The configured keyword that matched, as configured. Null for ORDINARY. */
    keyword: string | null;
}

export interface KeywordLists {
    /** Substrings classified as VISION_TRIGGER, in precedence order. */
    vision: readonly string[];
    /** Checked before `vision`; group order is precedence order. */
    camera: ReadonlyArray<{ action: 'open' | 'close'; keywords: readonly string[] }>;
    /** When false, VISION_TRIGGER is never produced. */
    visionEnabled: boolean;
}
