import { Test } from '@nestjs/testing';
import {
    EmptyAnswerError,
    PracticeNotFoundError,
    UnsupportedAnalysisKindError,
} from '../../common/errors';
import { AppConfigService } from '../../config/config.service';
import { makeConfig } from '../../../test/support/config';
import { ScriptedOpenAIService } from '../../../test/support/fake-openai';
import {
    InMemoryPracticeStore,
    InMemorySectionAnswerStore,
    TestClock,
} from '../../../test/support/in-memory-stores';
import { FrameworkModule } from '../framework/framework.module';
import { OpenAIService } from '../openai/openai.service';
import { PracticeService } from '../practice/practice.service';
import { StructureHintService } from '../practice/services/structure-hint.service';
import { PracticeStore } from '../practice/stores/practice.store';
import { SectionAnswerStore } from '../practice/stores/section-answer.store';
import { TranscriptionService } from '../transcription/transcription.service';
import { AnalysisAggregator } from './analysis.aggregator';
import { AnalysisService } from './analysis.service';
import { ANALYSIS_DIMENSIONS, AnalysisDimension } from './dimensions/analysis-dimension';
import { ContentQualityDimension } from './dimensions/content-quality.dimension';
import { PaceDimension } from './dimensions/pace.dimension';
import { PauseDimension } from './dimensions/pause.dimension';
import { StructureDimension } from './dimensions/structure.dimension';

async function setup(openai = new ScriptedOpenAIService(false)) {
    const clock = new TestClock();
    const practices = new InMemoryPracticeStore(clock);
    const answers = new InMemorySectionAnswerStore(clock);

    const moduleRef = await Test.createTestingModule({
        imports: [FrameworkModule],
        providers: [
            PracticeService,
            StructureHintService,
            TranscriptionService,
            { provide: OpenAIService, useValue: openai },
            { provide: AppConfigService, useValue: makeConfig({ perKindTimeoutMs: 500 }) },
            { provide: PracticeStore, useValue: practices },
            { provide: SectionAnswerStore, useValue: answers },
            ContentQualityDimension,
            StructureDimension,
            PaceDimension,
            PauseDimension,
            {
                provide: ANALYSIS_DIMENSIONS,
                useFactory: (
                    c: ContentQualityDimension,
                    s: StructureDimension,
                    p: PaceDimension,
                    q: PauseDimension,
                ): AnalysisDimension[] => [c, s, p, q],
                inject: [ContentQualityDimension, StructureDimension, PaceDimension, PauseDimension],
            },
            AnalysisAggregator,
            AnalysisService,
        ],
    }).compile();

    const practiceService = moduleRef.get(PracticeService);
    const practice = await practiceService.createPractice({
        interviewId: 'interview-1',
        track: 'backend',
        questions: [{ text: 'Tell me about a hard deadline.', structureHint: 'STAR please' }],
    });

    return {
        analysis: moduleRef.get(AnalysisService),
        practiceService,
        answers,
        practiceId: practice.practiceId,
    };
}

describe('AnalysisService', () => {
    it('analyzes a 1-of-4 STAR answer and stores it on the latest section', async () => {
        const { analysis, practiceService, answers, practiceId } = await setup();
        await practiceService.submitSection(practiceId, 0, 'Situation', 'We had two days left.', 20);

        const result = await analysis.analyzeQuestion(practiceId, 0);

        expect(result.snapshot).toMatchObject({
            sectionsCompleteCount: 1,
            totalSections: 4,
            nextSection: 'Task',
            isComplete: false,
        });
        expect(result.analysis.sectionStatuses).toEqual({
            Situation: 'partial',
            Task: 'missing',
            Action: 'missing',
            Result: 'missing',
        });
        // 1/4*50 + (50/4)/100*50
        expect(result.analysis.compositeScore).toBe(18.75);
        expect(result.analysis.requestedKinds).toEqual(['content', 'structure', 'pace', 'pause']);
        expect(result.analysis.perDimension.find((r) => r.kind === 'content')?.status).toBe('failed');

        const stored = await answers.findLatestAnalysis(practiceId, 0);
        expect(stored?.answerId).toBe(result.answerId);
        expect(stored?.analysis.compositeScore).toBe(18.75);
    });

    it('moves the stored analysis to the most recently submitted section', async () => {
        const { analysis, practiceService, answers, practiceId } = await setup();
        await practiceService.submitSection(practiceId, 0, 'Situation', 'first', 10);
        const first = await analysis.analyzeQuestion(practiceId, 0, { kinds: ['structure'] });

        const task = await practiceService.submitSection(practiceId, 0, 'Task', 'second', 10);
        const second = await analysis.analyzeQuestion(practiceId, 0, { kinds: ['structure'] });

        expect(second.answerId).toBe(task.answerId);
        expect(second.answerId).not.toBe(first.answerId);
        expect(answers.rows.filter((r) => r.analysis !== null).map((r) => r.answerId)).toEqual([
            task.answerId,
        ]);
    });

    it('leaves the analysis stale after a resubmission until the next analyze', async () => {
        const { analysis, practiceService, practiceId } = await setup();
        await practiceService.submitSection(practiceId, 0, 'Situation', 'first', 10);
        await analysis.analyzeQuestion(practiceId, 0, { kinds: ['structure'] });

        expect((await analysis.getLatestAnalysis(practiceId, 0)).stale).toBe(false);

        await practiceService.submitSection(practiceId, 0, 'Situation', 'rewritten', 12);
        const view = await analysis.getLatestAnalysis(practiceId, 0);
        expect(view.stale).toBe(true);
        expect(view.latest?.analysis.sectionStatuses.Situation).toBe('partial');

        await analysis.analyzeQuestion(practiceId, 0, { kinds: ['structure'] });
        expect((await analysis.getLatestAnalysis(practiceId, 0)).stale).toBe(false);
    });

    it('marks the analysis stale when a section is resubmitted while it runs', async () => {
        const openai = new ScriptedOpenAIService();
        const { analysis, practiceService, practiceId } = await setup(openai);
        await practiceService.submitSection(practiceId, 0, 'Situation', 'original situation text', 10);

        openai.onChat(async () => {
            await practiceService.submitSection(practiceId, 0, 'Situation', 'NEW situation text', 10);
            return { sections: [{ name: 'Situation', quality: 'partial', feedback: 'Thin' }] };
        });
        const result = await analysis.analyzeQuestion(practiceId, 0, { kinds: ['content'] });

        expect(openai.chatCalls[0]?.[1]?.content).toContain('original situation text');
        expect(result.analysis.basedOnSubmittedAt).not.toBeNull();

        const view = await analysis.getLatestAnalysis(practiceId, 0);
        expect(view.latest?.answerId).toBe(result.answerId);
        expect(view.stale).toBe(true);
    });

    it('rejects a question with no submitted sections', async () => {
        const { analysis, practiceId } = await setup();
        await expect(analysis.analyzeQuestion(practiceId, 0)).rejects.toBeInstanceOf(EmptyAnswerError);
    });

    it('validates the requested kinds before touching storage', async () => {
        const { analysis } = await setup();
        await expect(
            analysis.analyzeQuestion(404, 0, { kinds: ['sentiment'] }),
        ).rejects.toBeInstanceOf(UnsupportedAnalysisKindError);
        await expect(analysis.analyzeQuestion(404, 0)).rejects.toBeInstanceOf(PracticeNotFoundError);
    });

    it('returns no analysis before the first analyze', async () => {
        const { analysis, practiceId } = await setup();
        expect(await analysis.getLatestAnalysis(practiceId, 0)).toEqual({
            practiceId,
            questionIndex: 0,
            latest: null,
            stale: false,
        });
    });
});
