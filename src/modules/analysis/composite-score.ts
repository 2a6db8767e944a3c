import { countWords } from '../../common/text';
import { SectionQuality, SectionStatus } from './types/analysis.types';

// 이 단어 수 이상이면 휴리스틱 품질 good
export const HEURISTIC_GOOD_WORDS = 30;

const QUALITY_POINTS: Record<SectionQuality, number> = {
    good: 100,
    partial: 50,
    missing: 0,
};

export function heuristicQuality(answerText: string): SectionQuality {
    return countWords(answerText) >= HEURISTIC_GOOD_WORDS ? 'good' : 'partial';
}

export function statusFromQuality(quality: SectionQuality): SectionStatus {
    if (quality === 'good') return 'complete';
    return quality;
}

/**
 * 완성도 50점 + 품질 50점.
 * qualities는 프레임워크 전체 섹션 기준이며 미제출 섹션은 missing이다.
 */
export function computeCompositeScore(
    frameworkSections: readonly string[],
    qualities: Record<string, SectionQuality>,
): number {
    const total = frameworkSections.length;
    if (total === 0) return 0;

    let submitted = 0;
    let points = 0;
    for (const name of frameworkSections) {
        const q = qualities[name] ?? 'missing';
        if (q !== 'missing') submitted += 1;
        points += QUALITY_POINTS[q];
    }

    const completeness = (submitted / total) * 50;
    const quality = (points / total / 100) * 50;
    return Math.round((completeness + quality) * 100) / 100;
}
