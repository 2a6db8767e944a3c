import { CTETD, GCDIO } from '../framework/frameworks';
import { computeSnapshot, progressMessage } from './progress';
import { SectionAnswer } from './types/practice.types';

function answer(sectionName: string, answerId: number): SectionAnswer {
    return {
        answerId,
        practiceId: 1,
        questionIndex: 0,
        sectionName,
        answerText: `${sectionName} answer`,
        timeSpentSeconds: 30,
        transcription: null,
        submittedAt: new Date(Date.UTC(2026, 0, 1, 0, 0, answerId)),
    };
}

describe('progress', () => {
    it('keeps the framework order regardless of submission order', () => {
        const snap = computeSnapshot(CTETD, [answer('Decision', 1), answer('Context', 2)]);
        expect(snap.sectionsSubmitted).toEqual(['Context', 'Decision']);
        expect(snap.sections.map((s) => s.submitted)).toEqual([true, false, false, false, true]);
        expect(snap.nextSection).toBe('Theory');
        expect(snap.nextHint).toBe(CTETD.sectionHints.Theory);
    });

    it('ignores answers for sections outside the framework', () => {
        const snap = computeSnapshot(CTETD, [answer('Situation', 1)]);
        expect(snap.sectionsCompleteCount).toBe(0);
    });

    it.each([
        [3, "You're halfway there! Now explain Implementation. "],
        [4, 'Almost done! Time for Outcome. '],
    ])('after %i sections the message starts with %s', (count, prefix) => {
        const done = GCDIO.sections.slice(0, count).map((s, i) => answer(s, i + 1));
        const snap = computeSnapshot(GCDIO, done);
        const next = snap.nextSection ?? '';
        expect(progressMessage(GCDIO, snap)).toBe(prefix + GCDIO.sectionHints[next]);
    });

    it('uses the generic message when the count has no dedicated wording', () => {
        const snap = computeSnapshot(GCDIO, [answer('Outcome', 1)]);
        const withFive = { ...snap, sectionsCompleteCount: 5, nextSection: 'Goal' };
        expect(progressMessage(GCDIO, withFive)).toBe(`Continue with Goal. ${snap.nextHint ?? ''}`);
    });

    it('names the display form of the framework on completion', () => {
        const snap = computeSnapshot(
            GCDIO,
            GCDIO.sections.map((s, i) => answer(s, i + 1)),
        );
        expect(snap.isComplete).toBe(true);
        expect(progressMessage(GCDIO, snap)).toBe(
            "Excellent! You've completed all sections of the G-C-D-I-O framework. Your answer will now be analyzed.",
        );
    });
});
