import { UnknownSectionError } from '../../common/errors';
import { FrameworkRegistry } from './framework.registry';
import { Framework } from './framework.types';

describe('FrameworkRegistry', () => {
    let registry: FrameworkRegistry;

    beforeEach(() => {
        registry = new FrameworkRegistry();
    });

    describe('detect', () => {
        it.each([
            ['Use the STAR method: Situation, Task, Action, Result.', 'STAR'],
            ['Describe the situation you were in first.', 'STAR'],
            ['Follow GCDIO for this design.', 'GCDIO'],
            ['Answer with G-C-D-I-O.', 'GCDIO'],
            ['State the goal, then the constraints you had.', 'GCDIO'],
            ['Structure it as C-T-E-T-D.', 'C-T-E-T-D'],
            ['Explain the theory, then weigh each trade-off.', 'C-T-E-T-D'],
        ])('%s -> %s', (hint, expected) => {
            expect(registry.detect(hint).name).toBe(expected);
        });

        it('matches case-insensitively', () => {
            expect(registry.detect('use star').name).toBe('STAR');
            expect(registry.detect('CTETD please').name).toBe('C-T-E-T-D');
        });

        it('does not treat "start" as the STAR marker', () => {
            expect(registry.detect('Start with the goal and the constraints').name).toBe('GCDIO');
        });

        it('falls back to STAR when nothing matches', () => {
            expect(registry.detect('Talk about anything you like').name).toBe('STAR');
            expect(registry.detect('').name).toBe('STAR');
            expect(registry.detect(undefined).name).toBe('STAR');
        });

        it('uses the fixed priority order when several markers appear', () => {
            expect(registry.detect('STAR or C-T-E-T-D, your choice').name).toBe('STAR');
            expect(registry.detect('GCDIO or C-T-E-T-D, your choice').name).toBe('GCDIO');
        });

        it('returns the same framework for the same input', () => {
            const hint = 'Explain the theory and the trade-offs';
            expect(registry.detect(hint)).toBe(registry.detect(hint));
        });
    });

    describe('sections', () => {
        it('every framework has a non-empty duplicate-free stable section list', () => {
            for (const fw of registry.list()) {
                const first = registry.sectionsFor(fw);
                expect(first.length).toBeGreaterThan(0);
                expect(new Set(first).size).toBe(first.length);
                expect(registry.sectionsFor(fw)).toEqual(first);
            }
        });

        it('knows the three built-in frameworks', () => {
            expect(registry.get('STAR')?.sections).toEqual(['Situation', 'Task', 'Action', 'Result']);
            expect(registry.get('C-T-E-T-D')?.sections).toEqual([
                'Context',
                'Theory',
                'Example',
                'Trade-offs',
                'Decision',
            ]);
            expect(registry.get('GCDIO')?.sections).toEqual([
                'Goal',
                'Constraints',
                'Decision',
                'Implementation',
                'Outcome',
            ]);
            expect(registry.get('nope')).toBeNull();
        });
    });

    describe('hintFor', () => {
        it('returns the section hint', () => {
            const star = registry.detect('star');
            expect(registry.hintFor(star, 'Task')).toBe(
                'Define your responsibility. What was your specific role? What were you asked to do?',
            );
        });

        it('throws UnknownSectionError for a foreign section', () => {
            const star = registry.detect('star');
            expect(() => registry.hintFor(star, 'Theory')).toThrow(UnknownSectionError);
        });

        it('builds the initial hint from the first section', () => {
            const star = registry.detect('star');
            expect(registry.initialHint(star)).toEqual({
                sectionName: 'Situation',
                hint: 'Start with Situation: Describe the context. What was happening? Where were you? What was the challenge or scenario?',
            });
        });
    });

    describe('register', () => {
        const soar: Framework = {
            name: 'SOAR',
            displayName: 'SOAR',
            sections: ['Situation', 'Obstacle', 'Action', 'Result'],
            sectionHints: {
                Situation: 'Where were you?',
                Obstacle: 'What stood in the way?',
                Action: 'What did you do?',
                Result: 'What happened?',
            },
        };

        it('adds a framework that detect() can pick', () => {
            registry.register(soar, (hint) => hint.includes('soar'), 5);
            expect(registry.detect('Use SOAR here').name).toBe('SOAR');
            expect(registry.get('SOAR')).toBe(soar);
        });

        it('rejects a framework with duplicate sections', () => {
            const broken: Framework = { ...soar, name: 'BROKEN', sections: ['Action', 'Action'] };
            expect(() => registry.register(broken, () => false, 1)).toThrow(/duplicate/);
        });
    });
});
