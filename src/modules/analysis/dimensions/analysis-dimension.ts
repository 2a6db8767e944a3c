import { AnalysisInput, AnalysisKind, PayloadOf } from '../types/analysis.types';

/**
 * 분석 차원 하나. 집계기가 차원마다 별도 signal을 넘기며,
 * 타임아웃이면 signal이 abort되고 neutralPayload()가 결과 자리에 들어간다.
 */
export interface AnalysisDimension<K extends AnalysisKind = AnalysisKind> {
    readonly kind: K;
    analyze(input: AnalysisInput, signal: AbortSignal): Promise<PayloadOf<K>>;
    neutralPayload(input: AnalysisInput): PayloadOf<K>;
}

export const ANALYSIS_DIMENSIONS = Symbol('ANALYSIS_DIMENSIONS');
