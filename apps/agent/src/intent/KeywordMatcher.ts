// Keyword Matcher
// Classifies an utterance as a vision trigger, a camera command or ordinary text

import type { Utterance } from '@glimpse/contracts';
import { IntentKind, type KeywordLists, type KeywordMatch } from './IntentTypes.js';

interface CompiledGroup {
    kind: IntentKind;
    keywords: Array<{ raw: string; normalized: string }>;
}

const ORDINARY: KeywordMatch = { kind: IntentKind.ORDINARY, keyword: null };

// Whitespace and common CJK/ASCII punctuation, ignored when deciding whether an
// utterance says more than its keyword.
const FILLER = /[\s\p{P}]+/gu;

export function normalizeText(text: string): string {
    return text.normalize('NFKC').toLowerCase();
}

function compile(kind: IntentKind, keywords: readonly string[]): CompiledGroup {
    return {
        kind,
        keywords: keywords
            .map(raw => ({ raw, normalized: normalizeText(raw).trim() }))
            .filter(k => k.normalized.length > 0),
    };
}

export class KeywordMatcher {
    private readonly groups: CompiledGroup[];

    constructor(lists: KeywordLists) {
        this.groups = lists.camera.map(group =>
            compile(group.action === 'open' ? IntentKind.CAMERA_OPEN : IntentKind.CAMERA_CLOSE, group.keywords)
        );

        if (lists.visionEnabled) {
            this.groups.push(compile(IntentKind.VISION_TRIGGER, lists.vision));
        }
    }

    /**
     * First match by group precedence, then by keyword order within the group.
     * Vision answers are never scanned.
     */
    match(utterance: Pick<Utterance, 'text' | 'origin'>): KeywordMatch {
        if (utterance.origin === 'vision_answer') {
            return ORDINARY;
        }

        const text = normalizeText(utterance.text);
        for (const group of this.groups) {
            for (const keyword of group.keywords) {
                if (text.includes(keyword.normalized)) {
                    return { kind: group.kind, keyword: keyword.raw };
                }
            }
        }
        return ORDINARY;
    }

    classify(utterance: Pick<Utterance, 'text' | 'origin'>): IntentKind {
        return this.match(utterance).kind;
    }
}

/**
 * The utterance itself is the prompt when it says more than the keyword;
 * otherwise the configured default prompt is used.
 */
export function selectPrompt(text: string, keyword: string | null, defaultPrompt: string): string {
    const trimmed = text.trim();
    let rest = normalizeText(trimmed);
    if (keyword) {
        rest = rest.replace(normalizeText(keyword).trim(), '');
    }
    return rest.replace(FILLER, '').length > 0 ? trimmed : defaultPrompt;
}
