import { Injectable } from '@nestjs/common';
import { UnknownSectionError } from '../../common/errors';
import { Framework, FrameworkMatcher, FrameworkRegistration } from './framework.types';
import { DEFAULT_FRAMEWORK, DEFAULT_REGISTRATIONS } from './frameworks';

/**
 * 프레임워크 이름 → 섹션 목록/섹션 힌트 조회와 구조 힌트 기반 프레임워크 판정.
 * 새 프레임워크는 register()로 추가하며 호출부는 바뀌지 않는다.
 */
@Injectable()
export class FrameworkRegistry {
    private readonly registrations: FrameworkRegistration[] = [];
    private readonly byName = new Map<string, Framework>();
    private readonly fallback: Framework;

    constructor() {
        this.fallback = DEFAULT_FRAMEWORK;
        for (const r of DEFAULT_REGISTRATIONS) {
            this.register(r.framework, r.matcher, r.priority);
        }
    }

    register(framework: Framework, matcher: FrameworkMatcher, priority: number): void {
        if (framework.sections.length === 0) {
            throw new Error(`Framework ${framework.name} must have at least one section`);
        }
        if (new Set(framework.sections).size !== framework.sections.length) {
            throw new Error(`Framework ${framework.name} has duplicate sections`);
        }
        for (const s of framework.sections) {
            if (!framework.sectionHints[s]) {
                throw new Error(`Framework ${framework.name} is missing a hint for ${s}`);
            }
        }

        const existing = this.registrations.findIndex((r) => r.framework.name === framework.name);
        if (existing >= 0) this.registrations.splice(existing, 1);

        this.registrations.push({ framework, matcher, priority });
        // 우선순위가 같으면 먼저 등록된 것이 앞
        this.registrations.sort((a, b) => a.priority - b.priority);
        this.byName.set(framework.name, framework);
    }

    // 순수 함수: 같은 입력이면 항상 같은 프레임워크
    detect(structuralHint: string | null | undefined): Framework {
        const normalized = (structuralHint ?? '').toLowerCase();
        const hit = this.registrations.find((r) => r.matcher(normalized));
        return hit ? hit.framework : this.fallback;
    }

    get(name: string): Framework | null {
        return this.byName.get(name) ?? null;
    }

    list(): Framework[] {
        return this.registrations.map((r) => r.framework);
    }

    sectionsFor(framework: Framework): readonly string[] {
        return framework.sections;
    }

    hasSection(framework: Framework, section: string): boolean {
        return framework.sections.includes(section);
    }

    hintFor(framework: Framework, section: string): string {
        if (!this.hasSection(framework, section)) {
            throw new UnknownSectionError(framework.name, section);
        }
        return framework.sectionHints[section] ?? '';
    }

    initialHint(framework: Framework): { sectionName: string; hint: string } {
        const first = framework.sections[0] ?? '';
        return { sectionName: first, hint: `Start with ${first}: ${this.hintFor(framework, first)}` };
    }
}
