import { describe, it, expect } from 'vitest';
import { normalizeTitle, titlesMatch, wordOverlap } from '../nlp/title-matcher.js';

describe('Title Matcher', () => {
    describe('normalizeTitle', () => {
        it('should lowercase and turn punctuation into spaces', () => {
            expect(normalizeTitle('Graph-Based Reasoning: A Survey.')).toBe('graph based reasoning a survey');
        });

        it('should collapse whitespace', () => {
            expect(normalizeTitle('  Deep\n   Learning\tfor  Graphs ')).toBe('deep learning for graphs');
        });

        it('should keep non-ASCII letters and digits', () => {
            expect(normalizeTitle('Über GNNs in 2025!')).toBe('über gnns in 2025');
        });
    });

    describe('titlesMatch', () => {
        it('should match titles that differ only in case', () => {
            expect(titlesMatch('Graph Neural Networks', 'graph neural networks')).toBe(true);
        });

        it('should match when one title contains the other', () => {
            expect(
                titlesMatch('Deep Learning for Knowledge Graphs', 'Deep Learning for Knowledge Graphs: A Survey')
            ).toBe(true);
        });

        it('should match containment in the other direction', () => {
            expect(titlesMatch('Knowledge Graphs: Methods and Applications', 'Knowledge Graphs')).toBe(true);
        });

        it('should reject titles with half their content words in common', () => {
            // {fast, algorithm} vs {quick, algorithm} → 1/2
            expect(titlesMatch('A Fast Algorithm', 'A Quick Algorithm')).toBe(false);
        });

        it('should match reordered titles with high word overlap', () => {
            // {knowledge, graph, embedding, temporal} vs {temporal, knowledge, graph, embedding, learning} → 4/4
            expect(
                titlesMatch('Knowledge Graph Embedding, Temporal', 'Learning Temporal Knowledge Graph Embedding')
            ).toBe(true);
        });

        it('should reject an overlap of exactly 0.7 or below', () => {
            // 7 of 10 content words shared → 0.7, not above the threshold
            const a = 'alpha beta gamma delta epsilon zeta eta theta iota kappa';
            const b = 'alpha beta gamma delta epsilon zeta eta lambda mu nu';
            expect(wordOverlap(a, b)).toBeCloseTo(0.7);
            expect(titlesMatch(a, b)).toBe(false);
        });

        it('should not match when a title has only stop-words', () => {
            expect(titlesMatch('On the', 'In an')).toBe(false);
        });

        it('should not match empty titles', () => {
            expect(titlesMatch('', 'Graph Neural Networks')).toBe(false);
            expect(titlesMatch('?!', 'Graph Neural Networks')).toBe(false);
            expect(titlesMatch('', '')).toBe(false);
            expect(titlesMatch('...', '!!')).toBe(false);
        });
    });

    describe('wordOverlap', () => {
        it('should ignore stop-words when counting', () => {
            expect(wordOverlap('The Theory of Graphs', 'Graphs and Theory')).toBe(1);
        });

        it('should return null when either side has no content words', () => {
            expect(wordOverlap('of the', 'Graph Theory')).toBeNull();
        });
    });
});
