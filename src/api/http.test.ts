import { describe, it, expect } from 'vitest';
import { matchActivityRoute, parseQuery } from './http.js';

describe('parseQuery', () => {
  it('returns an empty object without a query string', () => {
    expect(parseQuery('/activities')).toEqual({});
  });

  it('decodes percent escapes', () => {
    expect(parseQuery('/a?email=first.last%2Btag%40mergington.edu')).toEqual({
      email: 'first.last+tag@mergington.edu',
    });
  });

  it('reads a plus sign as a space', () => {
    expect(parseQuery('/a?name=Chess+Club')).toEqual({ name: 'Chess Club' });
  });

  it('keeps the first value of a repeated key', () => {
    expect(parseQuery('/a?email=one@mergington.edu&email=two@mergington.edu').email).toBe('one@mergington.edu');
  });
});

describe('matchActivityRoute', () => {
  it('matches signup and decodes the activity name', () => {
    expect(matchActivityRoute('/activities/Basketball%20Team/signup')).toEqual({
      ok: true,
      name: 'Basketball Team',
      action: 'signup',
    });
  });

  it('matches unregister', () => {
    expect(matchActivityRoute('/activities/Chess%20Club/unregister')).toEqual({
      ok: true,
      name: 'Chess Club',
      action: 'unregister',
    });
  });

  it('reports a malformed escape', () => {
    expect(matchActivityRoute('/activities/%E0%A4%A/signup')).toEqual({ ok: false, reason: 'malformed' });
  });

  it('does not match other shapes', () => {
    expect(matchActivityRoute('/activities')).toEqual({ ok: false, reason: 'no_match' });
    expect(matchActivityRoute('/activities//signup')).toEqual({ ok: false, reason: 'no_match' });
    expect(matchActivityRoute('/activities/a/b/signup')).toEqual({ ok: false, reason: 'no_match' });
    expect(matchActivityRoute('/activities/Chess%20Club/join')).toEqual({ ok: false, reason: 'no_match' });
  });
});
