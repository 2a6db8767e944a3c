import { z } from 'zod';
import { jsonColumn } from '../../../common/json-column';
import { AggregateAnalysisSchema } from '../../analysis/types/analysis.types';

const dateColumn = z.coerce.date();

export const PracticeQuestionSchema = z.object({
    index: z.number().int(),
    text: z.string(),
    category: z.string().nullable(),
    structureHint: z.string(),
    framework: z.string(),
});

export const PracticeRowSchema = z
    .object({
        practice_id: z.coerce.number().int(),
        interview_id: z.string(),
        track: z.string(),
        difficulty: z.string().nullable(),
        status: z.enum(['in_progress', 'completed']),
        questions: jsonColumn(z.array(PracticeQuestionSchema)),
        created_at: dateColumn,
    })
    .transform((r) => ({
        practiceId: r.practice_id,
        interviewId: r.interview_id,
        track: r.track,
        difficulty: r.difficulty,
        status: r.status,
        questions: r.questions,
        createdAt: r.created_at,
    }));

export const TranscriptionMetaSchema = z.object({
    model: z.string(),
    wordCount: z.number(),
    durationSeconds: z.number().nullable(),
    latencyMs: z.number(),
});

export const SectionAnswerRowSchema = z
    .object({
        answer_id: z.coerce.number().int(),
        practice_id: z.coerce.number().int(),
        question_index: z.coerce.number().int(),
        section_name: z.string(),
        answer_text: z.string(),
        time_spent_seconds: z.coerce.number().nullable(),
        transcription: jsonColumn(TranscriptionMetaSchema.nullable()),
        submitted_at: dateColumn,
    })
    .transform((r) => ({
        answerId: r.answer_id,
        practiceId: r.practice_id,
        questionIndex: r.question_index,
        sectionName: r.section_name,
        answerText: r.answer_text,
        timeSpentSeconds: r.time_spent_seconds,
        transcription: r.transcription,
        submittedAt: r.submitted_at,
    }));

export const StoredAnalysisRowSchema = z
    .object({
        answer_id: z.coerce.number().int(),
        analysis_result: jsonColumn(AggregateAnalysisSchema),
        analyzed_at: dateColumn,
    })
    .transform((r) => ({
        answerId: r.answer_id,
        analysis: r.analysis_result,
        analyzedAt: r.analyzed_at,
    }));
