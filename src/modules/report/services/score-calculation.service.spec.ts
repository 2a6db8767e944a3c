import { AggregateAnalysis } from '../../analysis/types/analysis.types';
import { ScoreCalculationService } from './score-calculation.service';

describe('ScoreCalculationService', () => {
    const calc = new ScoreCalculationService();

    it('averages composites and scales by the attempted ratio', () => {
        // avg 60, ratio 2/3 → 25*0.6*0.667=10, 20*0.6*0.667=8
        expect(calc.heuristicScores([55, 65], 3)).toEqual({ knowledge: 10, speech: 8 });
        expect(calc.heuristicScores([], 3)).toEqual({ knowledge: 0, speech: 0 });
    });

    it('clamps model scores before applying the ratio', () => {
        expect(calc.applyAttemptRatio({ knowledge: 40, speech: -3 }, 1, 1)).toEqual({
            knowledge: 25,
            speech: 0,
        });
    });

    it('builds percentages with floor and the overall out of 45', () => {
        expect(calc.buildSummary({ knowledge: 17, speech: 11 }, 2, 2, 'heuristic')).toEqual({
            knowledgeCompetence: { score: 17, maxScore: 25, percentage: 68 },
            speechStructure: { score: 11, maxScore: 20, percentage: 55 },
            overallScore: 62,
            analyzedQuestions: 2,
            totalQuestions: 2,
            source: 'heuristic',
        });
    });

    it('derives feedback from section statuses and content notes', () => {
        const analysis: AggregateAnalysis = {
            framework: 'STAR',
            perDimension: [
                {
                    kind: 'content',
                    status: 'ok',
                    payload: {
                        kind: 'content',
                        sections: [],
                        keyInsight: '',
                        strengths: ['Concrete metrics'],
                        improvements: ['Name your own role'],
                    },
                    latencyMs: 3,
                },
                {
                    kind: 'pace',
                    status: 'ok',
                    payload: { kind: 'pace', overallWpm: 190, category: 'too_fast', sections: [] },
                    latencyMs: 1,
                },
            ],
            requestedKinds: ['content', 'pace'],
            succeededKinds: ['content', 'pace'],
            failedKinds: [],
            sectionStatuses: { Situation: 'complete', Task: 'partial', Action: 'missing', Result: 'missing' },
            qualitySource: 'llm',
            compositeScore: 31.25,
            computedAt: '2026-01-01T00:00:00.000Z',
            basedOnSubmittedAt: null,
        };

        expect(calc.feedbackFromAnalysis(analysis)).toEqual({
            strengths: ['Situation: well developed', 'Concrete metrics'],
            areasOfImprovement: [
                'Task: add more specific detail',
                'Action: not covered',
                'Result: not covered',
                'Name your own role',
                'Pace: slow down to stay easy to follow',
            ],
        });
    });
});
