import { z } from 'zod';

export const ANALYSIS_KINDS = ['content', 'structure', 'pace', 'pause'] as const;
export type AnalysisKind = (typeof ANALYSIS_KINDS)[number];

export const SectionQualitySchema = z.enum(['good', 'partial', 'missing']);
export type SectionQuality = z.infer<typeof SectionQualitySchema>;

export const SectionStatusSchema = z.enum(['complete', 'partial', 'missing']);
export type SectionStatus = z.infer<typeof SectionStatusSchema>;

export const PaceCategorySchema = z.enum(['too_slow', 'ideal', 'too_fast', 'unknown']);
export type PaceCategory = z.infer<typeof PaceCategorySchema>;

export const PauseCategorySchema = z.enum(['fluent', 'natural', 'hesitant', 'unknown']);
export type PauseCategory = z.infer<typeof PauseCategorySchema>;

// ===== 차원별 payload =====
export const ContentPayloadSchema = z.object({
    kind: z.literal('content'),
    sections: z.array(
        z.object({
            name: z.string(),
            quality: SectionQualitySchema,
            feedback: z.string(),
        }),
    ),
    keyInsight: z.string(),
    strengths: z.array(z.string()),
    improvements: z.array(z.string()),
});

export const StructurePayloadSchema = z.object({
    kind: z.literal('structure'),
    sections: z.array(
        z.object({
            name: z.string(),
            submitted: z.boolean(),
            wordCount: z.number(),
        }),
    ),
    submittedCount: z.number(),
    totalSections: z.number(),
    coverage: z.number(),
    missingSections: z.array(z.string()),
});

export const PacePayloadSchema = z.object({
    kind: z.literal('pace'),
    overallWpm: z.number().nullable(),
    category: PaceCategorySchema,
    sections: z.array(
        z.object({
            name: z.string(),
            wpm: z.number().nullable(),
            category: PaceCategorySchema,
        }),
    ),
});

export const PausePayloadSchema = z.object({
    kind: z.literal('pause'),
    pauseRatio: z.number().nullable(),
    fillerCount: z.number(),
    fillers: z.record(z.number()),
    category: PauseCategorySchema,
});

export const AnalysisPayloadSchema = z.discriminatedUnion('kind', [
    ContentPayloadSchema,
    StructurePayloadSchema,
    PacePayloadSchema,
    PausePayloadSchema,
]);

export type ContentPayload = z.infer<typeof ContentPayloadSchema>;
export type StructurePayload = z.infer<typeof StructurePayloadSchema>;
export type PacePayload = z.infer<typeof PacePayloadSchema>;
export type PausePayload = z.infer<typeof PausePayloadSchema>;
export type AnalysisPayload = z.infer<typeof AnalysisPayloadSchema>;

export type PayloadOf<K extends AnalysisKind> = Extract<AnalysisPayload, { kind: K }>;

export function isPayloadOf<K extends AnalysisKind>(
    kind: K,
    payload: AnalysisPayload | null,
): payload is PayloadOf<K> {
    return payload !== null && payload.kind === kind;
}

// ===== 집계 결과 =====
export const DimensionStatusSchema = z.enum(['ok', 'failed', 'timeout']);
export type DimensionStatus = z.infer<typeof DimensionStatusSchema>;

export const DimensionResultSchema = z.object({
    kind: z.enum(ANALYSIS_KINDS),
    status: DimensionStatusSchema,
    payload: AnalysisPayloadSchema.nullable(),
    error: z.string().optional(),
    latencyMs: z.number(),
});
export type DimensionResult = z.infer<typeof DimensionResultSchema>;

export const AggregateAnalysisSchema = z.object({
    framework: z.string(),
    perDimension: z.array(DimensionResultSchema),
    requestedKinds: z.array(z.enum(ANALYSIS_KINDS)),
    succeededKinds: z.array(z.enum(ANALYSIS_KINDS)),
    failedKinds: z.array(z.enum(ANALYSIS_KINDS)),
    sectionStatuses: z.record(SectionStatusSchema),
    qualitySource: z.enum(['llm', 'heuristic']),
    compositeScore: z.number(),
    computedAt: z.string(),
    // 분석에 쓰인 답변 중 가장 늦은 제출 시각 (이후 제출이 있으면 stale)
    basedOnSubmittedAt: z.string().nullable().default(null),
});
export type AggregateAnalysis = z.infer<typeof AggregateAnalysisSchema>;

export interface StoredAnalysis {
    answerId: number;
    analysis: AggregateAnalysis;
    analyzedAt: Date;
}

// ===== 차원 입력 =====
export interface AnalysisSectionInput {
    name: string;
    answerText: string;
    timeSpentSeconds: number | null;
}

export interface AnalysisInput {
    questionText: string;
    framework: string;
    // 프레임워크 전체 섹션 (미제출 포함, 프레임워크 순서)
    frameworkSections: readonly string[];
    // 제출된 섹션만, 프레임워크 순서
    sections: AnalysisSectionInput[];
    answerText: string;
    basedOnSubmittedAt?: Date;
}
