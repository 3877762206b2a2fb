import { describe, it, expect } from 'vitest';
import { IntentKind } from '../src/intent/IntentTypes.js';
import { KeywordMatcher, normalizeText, selectPrompt } from '../src/intent/KeywordMatcher.js';
import { CAMERA_KEYWORDS, DEFAULT_PROMPT, VISION_KEYWORDS } from './helpers.js';

function matcher(visionEnabled = true): KeywordMatcher {
    return new KeywordMatcher({ vision: VISION_KEYWORDS, camera: CAMERA_KEYWORDS, visionEnabled });
}

const speech = (text: string) => ({ text, origin: 'user_speech' as const });

describe('KeywordMatcher', () => {
    it('classifies camera commands before vision keywords', () => {
        // "打开摄像头" also contains the vision keyword "摄像头"
        expect(matcher().match(speech('请打开摄像头'))).toEqual({
            kind: IntentKind.CAMERA_OPEN,
            keyword: '打开摄像头',
        });
        expect(matcher().classify(speech('关闭摄像头吧'))).toBe(IntentKind.CAMERA_CLOSE);
    });

    it('resolves ties within a list by the first listed keyword', () => {
        // Both "看看" and "这是什么" occur; "看看" is listed first
        expect(matcher().match(speech('帮我看看这是什么'))).toEqual({
            kind: IntentKind.VISION_TRIGGER,
            keyword: '看看',
        });
    });

    it('returns ordinary for text without keywords', () => {
        expect(matcher().match(speech('今天天气怎么样'))).toEqual({ kind: IntentKind.ORDINARY, keyword: null });
    });

    it('never classifies a vision answer, whatever its text', () => {
        for (const text of ['看看', '打开摄像头', '关闭摄像头', 'Vision Analysis: 画面里有一张桌子']) {
            expect(matcher().classify({ text, origin: 'vision_answer' })).toBe(IntentKind.ORDINARY);
        }
    });

    it('keeps camera commands but drops vision triggers when vision is disabled', () => {
        const disabled = matcher(false);
        expect(disabled.classify(speech('看看这是什么'))).toBe(IntentKind.ORDINARY);
        expect(disabled.classify(speech('打开摄像头'))).toBe(IntentKind.CAMERA_OPEN);
    });

    it('matches case- and width-insensitively', () => {
        const latin = new KeywordMatcher({
            vision: ['Look'],
            camera: [{ action: 'open', keywords: ['Camera On'] }],
            visionEnabled: true,
        });
        expect(latin.classify(speech('please LOOK at this'))).toBe(IntentKind.VISION_TRIGGER);
        expect(latin.classify(speech('ｃａｍｅｒａ ｏｎ'))).toBe(IntentKind.CAMERA_OPEN);
    });

    it('ignores blank keywords', () => {
        const blank = new KeywordMatcher({ vision: ['  '], camera: [], visionEnabled: true });
        expect(blank.classify(speech('anything at all'))).toBe(IntentKind.ORDINARY);
    });
});

describe('normalizeText', () => {
    it('folds full-width characters and case', () => {
        expect(normalizeText('ＡＢＣ')).toBe('abc');
    });
});

describe('selectPrompt', () => {
    it('uses the default prompt when the utterance is only the keyword', () => {
        expect(selectPrompt('看看', '看看', DEFAULT_PROMPT)).toBe(DEFAULT_PROMPT);
        expect(selectPrompt(' 看看。', '看看', DEFAULT_PROMPT)).toBe(DEFAULT_PROMPT);
    });

    it('uses the utterance when it says more than the keyword', () => {
        expect(selectPrompt('帮我看看这是什么', '看看', DEFAULT_PROMPT)).toBe('帮我看看这是什么');
        expect(selectPrompt('  看看桌上有什么 ', '看看', DEFAULT_PROMPT)).toBe('看看桌上有什么');
    });

    it('uses the utterance when no keyword is known', () => {
        expect(selectPrompt('describe the room', null, DEFAULT_PROMPT)).toBe('describe the room');
        expect(selectPrompt('  ', null, DEFAULT_PROMPT)).toBe(DEFAULT_PROMPT);
    });
});
