import {
    InterviewNotFoundError,
    ReportNotFoundError,
    ReportSynthesisFailure,
} from '../../common/errors';
import { makeConfig } from '../../../test/support/config';
import { hangUntilAborted, ScriptedOpenAIService } from '../../../test/support/fake-openai';
import {
    InMemoryPracticeStore,
    InMemoryReportStore,
    InMemorySectionAnswerStore,
    TestClock,
} from '../../../test/support/in-memory-stores';
import { AnalysisAggregator } from '../analysis/analysis.aggregator';
import { AnalysisService } from '../analysis/analysis.service';
import { StructureDimension } from '../analysis/dimensions/structure.dimension';
import { FrameworkRegistry } from '../framework/framework.registry';
import { PracticeService } from '../practice/practice.service';
import { StructureHintService } from '../practice/services/structure-hint.service';
import { TranscriptionService } from '../transcription/transcription.service';
import { ReportService } from './report.service';
import { ReportScoringService } from './services/report-scoring.service';
import { ScoreCalculationService } from './services/score-calculation.service';

const LONG = Array.from({ length: 30 }, (_, i) => `word${i}`).join(' ');
const STAR_SECTIONS = ['Situation', 'Task', 'Action', 'Result'];

function setup(scorer = new ScriptedOpenAIService(false), scoringTimeoutMs = 1000) {
    const clock = new TestClock();
    const practices = new InMemoryPracticeStore(clock);
    const answers = new InMemorySectionAnswerStore(clock);
    const reports = new InMemoryReportStore();
    const offline = new ScriptedOpenAIService(false);

    const practiceService = new PracticeService(
        practices,
        answers,
        new FrameworkRegistry(),
        new StructureHintService(offline),
        new TranscriptionService(offline),
    );
    const analysis = new AnalysisService(
        practiceService,
        answers,
        new AnalysisAggregator([new StructureDimension()]),
        makeConfig(),
    );
    const service = new ReportService(
        practiceService,
        answers,
        reports,
        new ReportScoringService(scorer, makeConfig({ scoringTimeoutMs })),
        new ScoreCalculationService(),
    );
    return { service, practiceService, analysis, reports, scorer };
}

async function answerFully(
    practiceService: PracticeService,
    analysis: AnalysisService,
    practiceId: number,
    questionIndex: number,
) {
    for (const s of STAR_SECTIONS) {
        await practiceService.submitSection(practiceId, questionIndex, s, LONG, 12);
    }
    await analysis.analyzeQuestion(practiceId, questionIndex, { kinds: ['structure'] });
}

async function twoQuestionPractice(practiceService: PracticeService, interviewId = 'interview-1') {
    return practiceService.createPractice({
        interviewId,
        track: 'backend',
        questions: [
            { text: 'A time you shipped under pressure.', structureHint: 'STAR' },
            { text: 'A time you disagreed with a lead.', structureHint: 'STAR' },
        ],
    });
}

describe('ReportService', () => {
    it('scores with the heuristic and keeps a null entry for the unanalyzed question', async () => {
        const { service, practiceService, analysis } = setup();
        const { practiceId } = await twoQuestionPractice(practiceService);
        await answerFully(practiceService, analysis, practiceId, 0);

        const report = await service.synthesize('interview-1');

        // composite 100, ratio 1/2 → round(12.5)=13, round(10)=10
        expect(report.scoreSummary).toEqual({
            knowledgeCompetence: { score: 13, maxScore: 25, percentage: 52 },
            speechStructure: { score: 10, maxScore: 20, percentage: 50 },
            overallScore: 51,
            analyzedQuestions: 1,
            totalQuestions: 2,
            source: 'heuristic',
        });
        expect(report.perQuestionFeedback).toEqual([
            {
                strengths: [
                    'Situation: well developed',
                    'Task: well developed',
                    'Action: well developed',
                    'Result: well developed',
                ],
                areasOfImprovement: [],
            },
            null,
        ]);
        expect(report.questions.map((q) => q.compositeScore)).toEqual([100, null]);
        expect(report.overallFeedback.strengths).toHaveLength(4);
    });

    it('uses the model scores with the attempt penalty when the scorer answers', async () => {
        const scorer = new ScriptedOpenAIService(true).onChat(() => ({
            knowledgeCompetence: 20,
            speechStructure: '16',
            overallFeedback: { strengths: ['Clear stories'], areasOfImprovement: ['Answer every question'] },
            perQuestion: [
                { questionNumber: 1, strengths: ['Clear story'], areasOfImprovement: ['Quantify results'] },
            ],
        }));
        const { service, practiceService, analysis } = setup(scorer);
        const { practiceId } = await twoQuestionPractice(practiceService);
        await answerFully(practiceService, analysis, practiceId, 0);

        const report = await service.synthesize('interview-1');

        expect(scorer.chatCalls).toHaveLength(1);
        expect(report.scoreSummary).toMatchObject({
            knowledgeCompetence: { score: 10, percentage: 40 },
            speechStructure: { score: 8, percentage: 40 },
            overallScore: 40,
            source: 'llm',
        });
        expect(report.overallFeedback).toEqual({
            strengths: ['Clear stories'],
            areasOfImprovement: ['Answer every question'],
        });
        expect(report.perQuestionFeedback).toEqual([
            { strengths: ['Clear story'], areasOfImprovement: ['Quantify results'] },
            null,
        ]);
    });

    it('falls back to the heuristic when the scorer fails', async () => {
        const scorer = new ScriptedOpenAIService(true).onChat(() => ({ unexpected: true }));
        const { service, practiceService, analysis } = setup(scorer);
        const { practiceId } = await twoQuestionPractice(practiceService);
        await answerFully(practiceService, analysis, practiceId, 0);

        const report = await service.synthesize('interview-1');

        expect(report.scoreSummary.source).toBe('heuristic');
        expect(report.scoreSummary.overallScore).toBe(51);
    });

    it('aborts a slow scorer after the configured timeout and uses the heuristic', async () => {
        const scorer = new ScriptedOpenAIService(true).onChat((_, options) => hangUntilAborted(options.signal));
        const { service, practiceService, analysis } = setup(scorer, 50);
        const { practiceId } = await twoQuestionPractice(practiceService);
        await answerFully(practiceService, analysis, practiceId, 0);

        const report = await service.synthesize('interview-1');

        expect(scorer.chatCalls).toHaveLength(1);
        expect(report.scoreSummary.source).toBe('heuristic');
        expect(report.scoreSummary.overallScore).toBe(51);
    });

    it('replaces the stored report on every synthesis', async () => {
        const { service, practiceService, analysis, reports } = setup();
        const { practiceId } = await twoQuestionPractice(practiceService);
        await answerFully(practiceService, analysis, practiceId, 0);
        const first = await service.synthesize('interview-1');

        await answerFully(practiceService, analysis, practiceId, 1);
        const second = await service.synthesize('interview-1');

        expect(reports.rows).toHaveLength(1);
        expect(second.reportId).not.toBe(first.reportId);
        expect(reports.rows[0]?.reportId).toBe(second.reportId);
        expect(second.scoreSummary.overallScore).toBe(100);
        expect(second.scoreSummary.knowledgeCompetence.score).toBe(25);
        expect(second.scoreSummary.speechStructure.score).toBe(20);
        expect(await service.getReport('interview-1')).toEqual(second);
    });

    it('collects questions across practices in creation order', async () => {
        const { service, practiceService, analysis } = setup();
        const p1 = await practiceService.createPractice({
            interviewId: 'interview-2',
            track: 'backend',
            questions: [{ text: 'First practice question', structureHint: 'STAR' }],
        });
        const p2 = await practiceService.createPractice({
            interviewId: 'interview-2',
            track: 'backend',
            questions: [{ text: 'Second practice question', structureHint: 'C-T-E-T-D' }],
        });
        await answerFully(practiceService, analysis, p1.practiceId, 0);

        const report = await service.synthesize('interview-2');

        expect(report.questions).toEqual([
            {
                practiceId: p1.practiceId,
                questionIndex: 0,
                question: 'First practice question',
                framework: 'STAR',
                compositeScore: 100,
            },
            {
                practiceId: p2.practiceId,
                questionIndex: 0,
                question: 'Second practice question',
                framework: 'C-T-E-T-D',
                compositeScore: null,
            },
        ]);
    });

    it('rejects an interview with no practice sessions', async () => {
        const { service } = setup();
        await expect(service.synthesize('nobody')).rejects.toBeInstanceOf(InterviewNotFoundError);
    });

    it('rejects an interview where nothing has been analyzed and stores nothing', async () => {
        const { service, practiceService, reports } = setup();
        const { practiceId } = await twoQuestionPractice(practiceService);
        await practiceService.submitSection(practiceId, 0, 'Situation', 'submitted but never analyzed', 5);

        await expect(service.synthesize('interview-1')).rejects.toBeInstanceOf(ReportSynthesisFailure);
        expect(reports.rows).toHaveLength(0);
    });

    it('reports a missing report as not found', async () => {
        const { service } = setup();
        await expect(service.getReport('interview-1')).rejects.toBeInstanceOf(ReportNotFoundError);
    });
});
