import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../../src/core/errors.js';
import {
  agentRootScope,
  formatScope,
  parseScopeUri,
  resolveScope,
  scopeCovers,
} from '../../../src/memory/scope.js';

describe('scope URIs', () => {
  it('should parse shared, user and agent scopes', () => {
    expect(parseScopeUri('uplift://shared/research')).toEqual({
      kind: 'shared', segments: ['research'], relative: false,
    });
    expect(parseScopeUri('uplift://user/preferences/ui')).toEqual({
      kind: 'user', segments: ['preferences', 'ui'], relative: false,
    });
    expect(parseScopeUri('uplift://agent/writer/drafts')).toEqual({
      kind: 'agent', segments: ['writer', 'drafts'], relative: false,
    });
  });

  it('should mark the private shorthand as relative', () => {
    expect(parseScopeUri('uplift://agent/private')).toEqual({
      kind: 'agent', segments: ['private'], relative: true,
    });
  });

  it('should normalize case and trailing slashes', () => {
    expect(formatScope(parseScopeUri('UPLIFT://Shared/Research/'))).toBe('uplift://shared/research');
  });

  it.each([
    ['memory://shared/x', 'must start with uplift://'],
    ['uplift://team/x', 'kind must be one of agent, user, shared'],
    ['uplift://shared', 'missing scope name'],
    ['uplift://agent/writer', 'agent scopes need an agent id and a name'],
    ['uplift://shared/bad name', 'bad segment "bad name"'],
  ])('should reject %s', (uri, reason) => {
    expect(() => parseScopeUri(uri)).toThrow(ValidationError);
    expect(() => parseScopeUri(uri)).toThrow(reason);
  });

  it('should resolve private scopes against the agent', () => {
    expect(resolveScope('uplift://agent/private', 'writer')).toBe('uplift://agent/writer/private');
    expect(resolveScope('uplift://agent/private/notes', 'writer')).toBe('uplift://agent/writer/private/notes');
    expect(resolveScope('uplift://shared/research', 'writer')).toBe('uplift://shared/research');
  });

  it('should refuse to resolve private scopes without an agent', () => {
    expect(() => resolveScope('uplift://agent/private', null)).toThrow(
      'Scope "uplift://agent/private" is relative to an agent and cannot be resolved here',
    );
  });

  it('should test scope containment on segment boundaries', () => {
    const root = agentRootScope('writer');
    expect(root).toBe('uplift://agent/writer');
    expect(scopeCovers(root, 'uplift://agent/writer')).toBe(true);
    expect(scopeCovers(root, 'uplift://agent/writer/private')).toBe(true);
    expect(scopeCovers(root, 'uplift://agent/writer-two/private')).toBe(false);
  });
});
