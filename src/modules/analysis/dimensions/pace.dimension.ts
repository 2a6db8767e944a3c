import { Injectable } from '@nestjs/common';
import { AnalysisFailureError } from '../../../common/errors';
import { countWords } from '../../../common/text';
import { AnalysisInput, PaceCategory, PacePayload } from '../types/analysis.types';
import { AnalysisDimension } from './analysis-dimension';

// 권장 말하기 속도 (words per minute)
export const IDEAL_WPM_MIN = 105;
export const IDEAL_WPM_MAX = 170;

export function paceCategory(wpm: number | null): PaceCategory {
    if (wpm === null) return 'unknown';
    if (wpm < IDEAL_WPM_MIN) return 'too_slow';
    if (wpm > IDEAL_WPM_MAX) return 'too_fast';
    return 'ideal';
}

const round1 = (n: number) => Math.round(n * 10) / 10;

@Injectable()
export class PaceDimension implements AnalysisDimension<'pace'> {
    readonly kind = 'pace' as const;

    async analyze(input: AnalysisInput): Promise<PacePayload> {
        let totalWords = 0;
        let totalSeconds = 0;

        const sections = input.sections.map((s) => {
            const seconds = s.timeSpentSeconds ?? 0;
            if (seconds <= 0) return { name: s.name, wpm: null, category: paceCategory(null) };
            const words = countWords(s.answerText);
            totalWords += words;
            totalSeconds += seconds;
            const wpm = round1((words / seconds) * 60);
            return { name: s.name, wpm, category: paceCategory(wpm) };
        });

        if (totalSeconds <= 0) {
            throw new AnalysisFailureError(this.kind, 'no section has timing data');
        }

        const overallWpm = round1((totalWords / totalSeconds) * 60);
        return { kind: 'pace', overallWpm, category: paceCategory(overallWpm), sections };
    }

    neutralPayload(input: AnalysisInput): PacePayload {
        return {
            kind: 'pace',
            overallWpm: null,
            category: 'unknown',
            sections: input.sections.map((s) => ({ name: s.name, wpm: null, category: 'unknown' })),
        };
    }
}
