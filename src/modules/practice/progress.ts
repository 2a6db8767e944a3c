import { Framework } from '../framework/framework.types';
import { ProgressSnapshot, SectionAnswer } from './types/practice.types';

// 완료한 섹션 수 → 격려 문구 (범위 밖이면 기본 문구)
const ENCOURAGEMENTS: Record<number, (next: string) => string> = {
    1: (next) => `Great start! Now move to ${next}. `,
    2: (next) => `Good progress! Next is ${next}. `,
    3: (next) => `You're halfway there! Now explain ${next}. `,
    4: (next) => `Almost done! Time for ${next}. `,
};

/**
 * 저장된 섹션 답변으로부터 진행 상태를 계산한다.
 * 프레임워크에 없는 섹션 이름은 무시한다.
 */
export function computeSnapshot(framework: Framework, answers: SectionAnswer[]): ProgressSnapshot {
    const byName = new Map<string, SectionAnswer>();
    for (const a of answers) {
        if (framework.sections.includes(a.sectionName)) byName.set(a.sectionName, a);
    }

    const sections = framework.sections.map((name) => {
        const a = byName.get(name);
        return {
            name,
            submitted: a !== undefined,
            timeSpentSeconds: a?.timeSpentSeconds ?? null,
            submittedAt: a?.submittedAt ?? null,
        };
    });

    const sectionsSubmitted = sections.filter((s) => s.submitted).map((s) => s.name);
    const nextSection = sections.find((s) => !s.submitted)?.name ?? null;

    return {
        framework: framework.name,
        sectionsSubmitted,
        sectionsCompleteCount: sectionsSubmitted.length,
        totalSections: framework.sections.length,
        nextSection,
        nextHint: nextSection ? (framework.sectionHints[nextSection] ?? null) : null,
        isComplete: nextSection === null,
        sections,
    };
}

export function completionMessage(framework: Framework): string {
    return `Excellent! You've completed all sections of the ${framework.displayName} framework. Your answer will now be analyzed.`;
}

export function progressMessage(framework: Framework, snapshot: ProgressSnapshot): string {
    if (snapshot.isComplete || snapshot.nextSection === null) {
        return completionMessage(framework);
    }
    const next = snapshot.nextSection;
    const lead = ENCOURAGEMENTS[snapshot.sectionsCompleteCount];
    const prefix = lead ? lead(next) : `Continue with ${next}. `;
    return prefix + (snapshot.nextHint ?? '');
}
