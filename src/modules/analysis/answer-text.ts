import { Framework } from '../framework/framework.types';
import { SectionAnswer } from '../practice/types/practice.types';
import { AnalysisSectionInput } from './types/analysis.types';

// 제출된 섹션만 프레임워크 순서로
export function orderedSections(framework: Framework, answers: SectionAnswer[]): AnalysisSectionInput[] {
    const byName = new Map(answers.map((a) => [a.sectionName, a]));
    return framework.sections.flatMap((name) => {
        const a = byName.get(name);
        return a ? [{ name, answerText: a.answerText, timeSpentSeconds: a.timeSpentSeconds }] : [];
    });
}

/** "[Section]\n본문" 블록을 빈 줄로 이어 붙인다 */
export function combineAnswerText(sections: AnalysisSectionInput[]): string {
    return sections.map((s) => `[${s.name}]\n${s.answerText}`).join('\n\n');
}
