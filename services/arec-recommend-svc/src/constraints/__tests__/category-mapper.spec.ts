import { describe, expect, it } from 'vitest';

import { CategoryMapper } from '../category-mapper';

describe('CategoryMapper', () => {
  const mapper = new CategoryMapper({ maxRequestedCategories: 3 });

  it('maps aliases to canonical tags in order of mention', () => {
    expect(mapper.map('Personality test for a Java developer')).toEqual(['personality-behaviour', 'java']);
  });

  it('prefers longer aliases over the shorter ones inside them', () => {
    expect(mapper.map('Java Script and SQL')).toEqual(['javascript', 'sql']);
  });

  it('matches aliases with symbols only on word boundaries', () => {
    expect(mapper.map('C# and C++ engineers')).toEqual(['csharp', 'cplusplus']);
    expect(mapper.map('javascripting')).toEqual([]);
  });

  it('ignores aliases that name more than one tag', () => {
    expect(mapper.map('leadership and python')).toEqual(['python']);
  });

  it('drops tags outside the catalog vocabulary', () => {
    expect(mapper.map('java and python', ['java', 'knowledge-skills'])).toEqual(['java']);
  });

  it('treats requests naming too many categories as unspecific', () => {
    expect(mapper.map('java, python, sql and excel')).toEqual([]);
  });

  it('accepts a custom alias table', () => {
    const custom = new CategoryMapper({ maxRequestedCategories: 2, aliases: { golang: 'go', go: 'go' } });

    expect(custom.map('Golang services')).toEqual(['go']);
    expect(custom.knownTags()).toEqual(['go']);
  });
});
