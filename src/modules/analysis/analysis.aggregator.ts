import { Inject, Injectable, Logger } from '@nestjs/common';
import {
    AnalysisTimeoutError,
    EmptyAnswerError,
    NoAnalysisKindsError,
    UnsupportedAnalysisKindError,
    errorMessage,
} from '../../common/errors';
import { computeCompositeScore, heuristicQuality, statusFromQuality } from './composite-score';
import { ANALYSIS_DIMENSIONS, AnalysisDimension } from './dimensions/analysis-dimension';
import {
    AggregateAnalysis,
    AnalysisInput,
    AnalysisKind,
    DimensionResult,
    SectionQuality,
    SectionStatus,
    isPayloadOf,
} from './types/analysis.types';

@Injectable()
export class AnalysisAggregator {
    private readonly logger = new Logger(AnalysisAggregator.name);
    private readonly byKind = new Map<string, AnalysisDimension>();

    constructor(@Inject(ANALYSIS_DIMENSIONS) dimensions: AnalysisDimension[]) {
        for (const d of dimensions) this.byKind.set(d.kind, d);
    }

    get supportedKinds(): AnalysisKind[] {
        return [...this.byKind.values()].map((d) => d.kind);
    }

    /** 요청 순서를 유지하고 중복은 한 번만 남긴다 */
    validateKinds(requested: readonly string[]): AnalysisDimension[] {
        if (requested.length === 0) throw new NoAnalysisKindsError(this.supportedKinds);
        const picked: AnalysisDimension[] = [];
        for (const kind of requested) {
            const d = this.byKind.get(kind);
            if (!d) throw new UnsupportedAnalysisKindError(kind, this.supportedKinds);
            if (!picked.includes(d)) picked.push(d);
        }
        return picked;
    }

    async aggregate(
        input: AnalysisInput,
        requestedKinds: readonly string[],
        perKindTimeoutMs: number,
    ): Promise<AggregateAnalysis> {
        const dimensions = this.validateKinds(requestedKinds);
        if (!input.answerText.trim()) throw new EmptyAnswerError();

        // 모든 차원을 동시에 시작하고 전부 끝날 때까지 기다린다
        const settled = await Promise.allSettled(
            dimensions.map((d) => this.runOne(d, input, perKindTimeoutMs)),
        );
        const perDimension: DimensionResult[] = settled.map((s, i) => {
            if (s.status === 'fulfilled') return s.value;
            const kind = dimensions[i]?.kind ?? 'content';
            return { kind, status: 'failed', payload: null, error: errorMessage(s.reason), latencyMs: 0 };
        });

        const { qualities, source } = this.sectionQualities(input, perDimension);
        const sectionStatuses: Record<string, SectionStatus> = {};
        for (const name of input.frameworkSections) {
            sectionStatuses[name] = statusFromQuality(qualities[name] ?? 'missing');
        }

        const analysis: AggregateAnalysis = {
            framework: input.framework,
            perDimension,
            requestedKinds: dimensions.map((d) => d.kind),
            succeededKinds: perDimension.filter((r) => r.status === 'ok').map((r) => r.kind),
            failedKinds: perDimension.filter((r) => r.status !== 'ok').map((r) => r.kind),
            sectionStatuses,
            qualitySource: source,
            compositeScore: computeCompositeScore(input.frameworkSections, qualities),
            computedAt: new Date().toISOString(),
            basedOnSubmittedAt: input.basedOnSubmittedAt?.toISOString() ?? null,
        };

        this.logger.log(
            `📊 분석 집계: ${analysis.succeededKinds.length}/${dimensions.length} 성공, composite=${analysis.compositeScore} (${source})`,
        );
        return analysis;
    }

    private async runOne(
        dimension: AnalysisDimension,
        input: AnalysisInput,
        timeoutMs: number,
    ): Promise<DimensionResult> {
        const kind = dimension.kind;
        const controller = new AbortController();
        const started = Date.now();
        let timer: NodeJS.Timeout | undefined;

        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                // 진행 중인 외부 호출도 함께 취소
                controller.abort();
                reject(new AnalysisTimeoutError(kind, timeoutMs));
            }, timeoutMs);
        });

        try {
            const payload = await Promise.race([dimension.analyze(input, controller.signal), timeout]);
            return { kind, status: 'ok', payload, latencyMs: Date.now() - started };
        } catch (error) {
            const latencyMs = Date.now() - started;
            if (error instanceof AnalysisTimeoutError) {
                this.logger.warn(`⏱️ 분석 타임아웃: ${kind} (${timeoutMs}ms)`);
                return {
                    kind,
                    status: 'timeout',
                    payload: dimension.neutralPayload(input),
                    error: error.message,
                    latencyMs,
                };
            }
            this.logger.warn(`⚠️ 분석 실패: ${kind} - ${errorMessage(error)}`);
            return { kind, status: 'failed', payload: null, error: errorMessage(error), latencyMs };
        } finally {
            clearTimeout(timer);
        }
    }

    // content 차원이 성공했으면 그 판정, 아니면 단어 수 휴리스틱
    private sectionQualities(
        input: AnalysisInput,
        results: DimensionResult[],
    ): { qualities: Record<string, SectionQuality>; source: 'llm' | 'heuristic' } {
        const submitted = new Map(input.sections.map((s) => [s.name, s]));
        const content = results.find((r) => r.kind === 'content' && r.status === 'ok');
        const judged = content && isPayloadOf('content', content.payload) ? content.payload : null;

        const qualities: Record<string, SectionQuality> = {};
        for (const name of input.frameworkSections) {
            const answer = submitted.get(name);
            if (!answer) {
                qualities[name] = 'missing';
                continue;
            }
            const fromModel = judged?.sections.find((s) => s.name === name)?.quality;
            const quality =
                fromModel && fromModel !== 'missing' ? fromModel : heuristicQuality(answer.answerText);
            qualities[name] = quality;
        }
        return { qualities, source: judged ? 'llm' : 'heuristic' };
    }
}
