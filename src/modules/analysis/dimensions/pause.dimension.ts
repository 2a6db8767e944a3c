import { Injectable } from '@nestjs/common';
import { countWords } from '../../../common/text';
import { AnalysisInput, PauseCategory, PausePayload } from '../types/analysis.types';
import { AnalysisDimension } from './analysis-dimension';

// 발화 시간 추정 기준 속도
export const REFERENCE_WPM = 150;

const FILLERS = ['um', 'uh', 'er', 'ah', 'like', 'you know', 'basically', 'actually', 'i mean', 'sort of', 'kind of'];

export function pauseCategory(ratio: number | null): PauseCategory {
    if (ratio === null) return 'unknown';
    if (ratio < 0.2) return 'fluent';
    if (ratio < 0.4) return 'natural';
    return 'hesitant';
}

export function countFillers(text: string): Record<string, number> {
    const lower = text.toLowerCase();
    const counts: Record<string, number> = {};
    for (const f of FILLERS) {
        const pattern = new RegExp(`\\b${f.replace(/ /g, '\\s+')}\\b`, 'g');
        const n = lower.match(pattern)?.length ?? 0;
        if (n > 0) counts[f] = n;
    }
    return counts;
}

@Injectable()
export class PauseDimension implements AnalysisDimension<'pause'> {
    readonly kind = 'pause' as const;

    async analyze(input: AnalysisInput): Promise<PausePayload> {
        const fillers = countFillers(input.answerText);
        const fillerCount = Object.values(fillers).reduce((a, b) => a + b, 0);

        // 시간 기록이 있는 섹션만으로 (실제 시간 - 예상 발화 시간) / 실제 시간
        let words = 0;
        let seconds = 0;
        for (const s of input.sections) {
            if (!s.timeSpentSeconds || s.timeSpentSeconds <= 0) continue;
            words += countWords(s.answerText);
            seconds += s.timeSpentSeconds;
        }

        let pauseRatio: number | null = null;
        if (seconds > 0) {
            const expectedSeconds = (words / REFERENCE_WPM) * 60;
            pauseRatio = Math.round(Math.max(0, (seconds - expectedSeconds) / seconds) * 100) / 100;
        }

        return { kind: 'pause', pauseRatio, fillerCount, fillers, category: pauseCategory(pauseRatio) };
    }

    neutralPayload(): PausePayload {
        return { kind: 'pause', pauseRatio: null, fillerCount: 0, fillers: {}, category: 'unknown' };
    }
}
