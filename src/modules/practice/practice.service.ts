import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
    InvalidSectionError,
    PracticeNotFoundError,
    QuestionIndexOutOfRangeError,
} from '../../common/errors';
import { FrameworkRegistry } from '../framework/framework.registry';
import { Framework } from '../framework/framework.types';
import { AudioUpload } from '../openai/openai.service';
import { TranscriptionService } from '../transcription/transcription.service';
import { computeSnapshot, progressMessage } from './progress';
import { StructureHintService } from './services/structure-hint.service';
import { PracticeStore } from './stores/practice.store';
import { SectionAnswerStore } from './stores/section-answer.store';
import {
    CreatePracticeInput,
    PracticeQuestion,
    PracticeRecord,
    PracticeView,
    ProgressSnapshot,
    SectionAnswerInput,
    SubmitSectionResult,
} from './types/practice.types';

export interface ResolvedQuestion {
    practice: PracticeRecord;
    question: PracticeQuestion;
    framework: Framework;
}

export interface SubmitAudioOptions {
    timeSpentSeconds?: number;
    language?: string;
}

@Injectable()
export class PracticeService {
    private readonly logger = new Logger(PracticeService.name);

    constructor(
        private readonly practices: PracticeStore,
        private readonly answers: SectionAnswerStore,
        private readonly frameworks: FrameworkRegistry,
        private readonly structureHints: StructureHintService,
        private readonly transcription: TranscriptionService,
    ) {}

    // ===== 연습 세션 =====
    async createPractice(input: CreatePracticeInput): Promise<PracticeView> {
        const interviewId = input.interviewId ?? uuidv4();
        const difficulty = input.difficulty ?? null;

        // 힌트가 없는 질문만 모아서 한 번에 생성
        const missing = input.questions
            .map((q, index) => ({
                index,
                text: q.text,
                category: q.category ?? null,
                hint: q.structureHint?.trim(),
            }))
            .filter((q) => !q.hint);
        const generated = await this.structureHints.generate(missing, {
            track: input.track,
            difficulty,
        });
        const generatedByIndex = new Map<number, string>();
        missing.forEach((q, i) => {
            const hint = generated[i];
            if (hint) generatedByIndex.set(q.index, hint);
        });

        const questions: PracticeQuestion[] = input.questions.map((q, index) => {
            const structureHint = q.structureHint?.trim() || generatedByIndex.get(index) || '';
            return {
                index,
                text: q.text,
                category: q.category ?? null,
                structureHint,
                framework: this.frameworks.detect(structureHint).name,
            };
        });

        const practice = await this.practices.create({
            interviewId,
            track: input.track,
            difficulty,
            questions,
        });
        this.logger.log(
            `📝 연습 생성: practiceId=${practice.practiceId}, interviewId=${interviewId}, 질문 ${questions.length}개 (힌트 생성 ${missing.length}개)`,
        );
        return this.toView(practice);
    }

    async getPractice(practiceId: number): Promise<PracticeView> {
        return this.toView(await this.requirePractice(practiceId));
    }

    // ===== 섹션 제출 =====
    async submitSection(
        practiceId: number,
        questionIndex: number,
        sectionName: string,
        answerText: string,
        timeSpentSeconds: number | null,
    ): Promise<SubmitSectionResult> {
        const target = await this.resolveSection(practiceId, questionIndex, sectionName);
        return this.record(target, {
            practiceId,
            questionIndex,
            sectionName,
            answerText,
            timeSpentSeconds,
            transcription: null,
        });
    }

    async submitSectionAudio(
        practiceId: number,
        questionIndex: number,
        sectionName: string,
        audio: AudioUpload,
        options: SubmitAudioOptions = {},
    ): Promise<SubmitSectionResult> {
        // 검증을 먼저 끝내야 잘못된 요청으로 전사 비용이 나가지 않는다
        const target = await this.resolveSection(practiceId, questionIndex, sectionName);
        const t = await this.transcription.transcribe(audio, options.language);

        const timeSpentSeconds =
            options.timeSpentSeconds ??
            (t.durationSeconds !== null ? Math.round(t.durationSeconds) : null);

        return this.record(target, {
            practiceId,
            questionIndex,
            sectionName,
            answerText: t.text,
            timeSpentSeconds,
            transcription: {
                model: t.model,
                wordCount: t.wordCount,
                durationSeconds: t.durationSeconds,
                latencyMs: t.latencyMs,
            },
        });
    }

    async getSnapshot(practiceId: number, questionIndex: number): Promise<ProgressSnapshot> {
        const { framework } = await this.resolveQuestion(practiceId, questionIndex);
        const answers = await this.answers.listForQuestion(practiceId, questionIndex);
        return computeSnapshot(framework, answers);
    }

    // ===== 조회/검증 헬퍼 (분석 모듈에서도 사용) =====
    async resolveQuestion(practiceId: number, questionIndex: number): Promise<ResolvedQuestion> {
        const practice = await this.requirePractice(practiceId);
        const question = practice.questions[questionIndex];
        if (!Number.isInteger(questionIndex) || questionIndex < 0 || !question) {
            throw new QuestionIndexOutOfRangeError(questionIndex, practice.questions.length);
        }
        return { practice, question, framework: this.frameworkOf(question) };
    }

    frameworkOf(question: PracticeQuestion): Framework {
        // 저장된 판정값 우선, 등록 해제된 경우에만 힌트로 재판정
        return this.frameworks.get(question.framework) ?? this.frameworks.detect(question.structureHint);
    }

    async listByInterview(interviewId: string): Promise<PracticeRecord[]> {
        return this.practices.listByInterview(interviewId);
    }

    private async resolveSection(
        practiceId: number,
        questionIndex: number,
        sectionName: string,
    ): Promise<ResolvedQuestion> {
        const target = await this.resolveQuestion(practiceId, questionIndex);
        if (!this.frameworks.hasSection(target.framework, sectionName)) {
            throw new InvalidSectionError(sectionName, target.framework.name, target.framework.sections);
        }
        return target;
    }

    private async record(target: ResolvedQuestion, input: SectionAnswerInput): Promise<SubmitSectionResult> {
        const saved = await this.answers.upsert(input);
        const answers = await this.answers.listForQuestion(input.practiceId, input.questionIndex);
        const snapshot = computeSnapshot(target.framework, answers);

        this.logger.log(
            `✅ 섹션 저장: practice=${input.practiceId} q=${input.questionIndex} ${input.sectionName} (${snapshot.sectionsCompleteCount}/${snapshot.totalSections})`,
        );

        if (snapshot.isComplete) {
            await this.markCompletedIfDone(target.practice);
        }

        return {
            answerId: saved.answerId,
            message: progressMessage(target.framework, snapshot),
            snapshot,
        };
    }

    // 모든 질문의 모든 섹션이 제출되면 세션 상태를 completed로
    private async markCompletedIfDone(practice: PracticeRecord): Promise<void> {
        if (practice.status === 'completed') return;
        const all = await this.answers.listForPractice(practice.practiceId);
        const done = practice.questions.every((q) => {
            const answers = all.filter((a) => a.questionIndex === q.index);
            return computeSnapshot(this.frameworkOf(q), answers).isComplete;
        });
        if (done) {
            await this.practices.updateStatus(practice.practiceId, 'completed');
            this.logger.log(`🏁 연습 완료: practiceId=${practice.practiceId}`);
        }
    }

    private async requirePractice(practiceId: number): Promise<PracticeRecord> {
        const practice = await this.practices.findById(practiceId);
        if (!practice) throw new PracticeNotFoundError(practiceId);
        return practice;
    }

    private toView(practice: PracticeRecord): PracticeView {
        return {
            ...practice,
            questions: practice.questions.map((q) => {
                const framework = this.frameworkOf(q);
                return {
                    ...q,
                    frameworkDisplayName: framework.displayName,
                    sections: framework.sections,
                    initialHint: this.frameworks.initialHint(framework),
                };
            }),
        };
    }
}
