import { describe, it, expect } from 'vitest';
import { documentText, scoreTokens, tokenize, tokensMatch } from '../../../src/memory/search.js';

describe('memory search', () => {
  it('should tokenize into lower-case words without stop words', () => {
    expect(tokenize('The Quantum-Computing results, 2024!')).toEqual(['quantum', 'computing', 'results', '2024']);
    expect(tokenize('a b of')).toEqual([]);
  });

  it('should keep long tokens and letters outside ASCII', () => {
    expect(tokenize('x'.repeat(60))).toEqual(['x'.repeat(60)]);
    expect(tokenize('量子 计算, Größe')).toEqual(['量子', '计算', 'größe']);
  });

  it('should match tokens by prefix of at least three characters', () => {
    expect(tokensMatch('quant', 'quantum')).toBe(true);
    expect(tokensMatch('quantum', 'quant')).toBe(true);
    expect(tokensMatch('qu', 'quantum')).toBe(false);
    expect(tokensMatch('abc', 'abd')).toBe(false);
  });

  it('should score the fraction of distinct query tokens found', () => {
    expect(scoreTokens(['quantum', 'error'], ['quantum', 'computing'])).toBe(0.5);
    expect(scoreTokens(['quantum', 'quantum'], ['quantum'])).toBe(1);
    expect(scoreTokens(['qubits'], ['qubit', 'coherence'])).toBe(1);
    expect(scoreTokens(['cooking'], ['quantum'])).toBe(0);
  });

  it('should match everything for an empty query', () => {
    expect(scoreTokens([], ['anything'])).toBe(1);
  });

  it('should search keys and serialized values', () => {
    expect(documentText('note', 'plain text')).toBe('note plain text');
    expect(documentText('note', { topic: 'qubits' })).toBe('note {"topic":"qubits"}');
  });
});
