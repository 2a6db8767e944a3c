export interface Framework {
    readonly name: string;
    readonly displayName: string;
    readonly sections: readonly string[];
    readonly sectionHints: Readonly<Record<string, string>>;
}

/** 소문자로 정규화된 구조 힌트를 받아 해당 프레임워크인지 판정하는 순수 함수 */
export type FrameworkMatcher = (normalizedHint: string) => boolean;

export interface FrameworkRegistration {
    framework: Framework;
    matcher: FrameworkMatcher;
    // 낮을수록 먼저 검사
    priority: number;
}
