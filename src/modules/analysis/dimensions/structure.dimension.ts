import { Injectable } from '@nestjs/common';
import { countWords } from '../../../common/text';
import { AnalysisInput, StructurePayload } from '../types/analysis.types';
import { AnalysisDimension } from './analysis-dimension';

// 섹션 제출 여부만 보는 결정적 분석
@Injectable()
export class StructureDimension implements AnalysisDimension<'structure'> {
    readonly kind = 'structure' as const;

    async analyze(input: AnalysisInput): Promise<StructurePayload> {
        return this.neutralPayload(input);
    }

    neutralPayload(input: AnalysisInput): StructurePayload {
        const byName = new Map(input.sections.map((s) => [s.name, s]));
        const sections = input.frameworkSections.map((name) => {
            const s = byName.get(name);
            return { name, submitted: s !== undefined, wordCount: s ? countWords(s.answerText) : 0 };
        });
        const submittedCount = sections.filter((s) => s.submitted).length;
        const totalSections = sections.length;
        return {
            kind: 'structure',
            sections,
            submittedCount,
            totalSections,
            coverage: totalSections ? Math.round((submittedCount / totalSections) * 100) / 100 : 0,
            missingSections: sections.filter((s) => !s.submitted).map((s) => s.name),
        };
    }
}
