/**
 * ConfigModel tests
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigModel,
  createConnection,
  isHostPattern,
  sameConnectionFields,
} from './config-model.js';
import {
  DuplicateNameError,
  InvalidConnectionError,
  NotFoundError,
} from '../errors/hostsync-error.js';

// ─── createConnection ────────────────────────────────────────────────────────

describe('createConnection', () => {
  it('fills in defaults', () => {
    const c = createConnection({ label: 'web', hostname: 'web.example.com' });
    expect(c).toEqual({
      label: 'web',
      hostname: 'web.example.com',
      port: 22,
      extraOptions: {},
      groupPath: [],
    });
  });

  it('drops empty optional fields', () => {
    const c = createConnection({ label: 'web', hostname: 'h', username: '', identityFile: '' });
    expect('username' in c).toBe(false);
    expect('identityFile' in c).toBe(false);
  });

  it('rejects an empty label', () => {
    expect(() => createConnection({ label: '', hostname: 'h' })).toThrow(InvalidConnectionError);
  });

  it('rejects a hostname with whitespace', () => {
    expect(() => createConnection({ label: 'a', hostname: 'two words' })).toThrow(InvalidConnectionError);
  });

  it.each([0, 65536, 22.5])('rejects port %s', (port) => {
    expect(() => createConnection({ label: 'a', hostname: 'h', port })).toThrow(InvalidConnectionError);
  });

  it('rejects a group name containing a slash', () => {
    expect(() => createConnection({ label: 'a', hostname: 'h', groupPath: ['a/b'] })).toThrow(
      InvalidConnectionError
    );
  });

  it('rejects an option that has a dedicated field', () => {
    expect(() =>
      createConnection({ label: 'a', hostname: 'h', extraOptions: { Port: '2222' } })
    ).toThrow('option Port must use its dedicated field');
  });

  it('rejects the same option listed twice in different casing', () => {
    expect(() =>
      createConnection({ label: 'a', hostname: 'h', extraOptions: { Compression: 'yes', compression: 'no' } })
    ).toThrow('option compression is listed twice');
  });

  it('rejects values that would not read back unchanged', () => {
    expect(() => createConnection({ label: 'a', hostname: 'h', extraOptions: { SetEnv: '=x' } })).toThrow(
      'Invalid connection "a": option SetEnv must not start with "="'
    );
    expect(() => createConnection({ label: 'a', hostname: 'h', username: 'me#1' })).toThrow(
      'Invalid connection "a": username must not contain "#"'
    );
    expect(() => createConnection({ label: 'a', hostname: 'h', identityFile: 'C:\\keys\\' })).toThrow(
      'Invalid connection "a": identityFile must not end with a backslash'
    );
    expect(() => createConnection({ label: 'a', hostname: 'h', username: '"me"' })).toThrow(
      'Invalid connection "a": username must not contain double quotes'
    );
    expect(() => createConnection({ label: 'a', hostname: 'h', proxyCommand: 'sh -c "nc' })).toThrow(
      'Invalid connection "a": proxyCommand has an unbalanced double quote'
    );
  });

  it('accepts a label with spaces but not one with quotes', () => {
    expect(createConnection({ label: 'My Server', hostname: 'h' }).label).toBe('My Server');
    expect(() => createConnection({ label: 'say "hi"', hostname: 'h' })).toThrow(InvalidConnectionError);
    expect(() => createConnection({ label: '=web', hostname: 'h' })).toThrow(InvalidConnectionError);
  });

  it('keeps balanced quotes in a proxy command', () => {
    expect(createConnection({ label: 'a', hostname: 'h', proxyCommand: 'sh -c "nc %h %p"' }).proxyCommand).toBe(
      'sh -c "nc %h %p"'
    );
  });

  it('accepts multi-valued options joined by newlines', () => {
    const c = createConnection({
      label: 'a',
      hostname: 'h',
      extraOptions: { LocalForward: '8080 localhost:80\n9090 localhost:90' },
    });
    expect(c.extraOptions.LocalForward).toBe('8080 localhost:80\n9090 localhost:90');
  });

  it('rejects an empty line inside a multi-valued option', () => {
    expect(() =>
      createConnection({ label: 'a', hostname: 'h', extraOptions: { LocalForward: '8080 x:80\n' } })
    ).toThrow(InvalidConnectionError);
  });
});

// ─── isHostPattern / sameConnectionFields ────────────────────────────────────

describe('isHostPattern', () => {
  it.each([
    ['*', true],
    ['*.example.com', true],
    ['web?', true],
    ['!bastion', true],
    ['web db', true],
    ['web', false],
    ['10.0.0.5', false],
  ])('%s → %s', (pattern, expected) => {
    expect(isHostPattern(pattern)).toBe(expected);
  });
});

describe('sameConnectionFields', () => {
  const a = createConnection({ label: 'a', hostname: 'h', extraOptions: { Compression: 'yes', ForwardAgent: 'no' } });
  const b = createConnection({ label: 'a', hostname: 'h', extraOptions: { ForwardAgent: 'no', Compression: 'yes' } });

  it('ignores option order by default', () => {
    expect(sameConnectionFields(a, b)).toBe(true);
  });

  it('compares option order when asked', () => {
    expect(sameConnectionFields(a, b, true)).toBe(false);
  });

  it('detects a changed port', () => {
    expect(sameConnectionFields(a, { ...a, port: 2222 })).toBe(false);
  });
});

// ─── ConfigModel ─────────────────────────────────────────────────────────────

describe('ConfigModel', () => {
  it('adds and finds connections by group path and label', () => {
    const model = new ConfigModel();
    model.addConnection({ label: 'db', hostname: '10.0.0.5', groupPath: ['work'] });
    expect(model.find(['work'], 'db').hostname).toBe('10.0.0.5');
    expect(model.has([], 'db')).toBe(false);
    expect(model.size).toBe(1);
  });

  it('allows the same label in different groups', () => {
    const model = new ConfigModel();
    model.addConnection({ label: 'db', hostname: 'a', groupPath: ['work'] });
    model.addConnection({ label: 'db', hostname: 'b', groupPath: ['home'] });
    expect(model.size).toBe(2);
  });

  it('throws DuplicateNameError for the same label in the same group', () => {
    const model = new ConfigModel();
    model.addConnection({ label: 'db', hostname: 'a' });
    expect(() => model.addConnection({ label: 'db', hostname: 'b' })).toThrow(DuplicateNameError);
  });

  it('throws NotFoundError for unknown connections', () => {
    const model = new ConfigModel();
    expect(() => model.find(['work'], 'db')).toThrow(NotFoundError);
    expect(() => model.replaceConnection({ label: 'db', hostname: 'h' })).toThrow(NotFoundError);
  });

  it('replaceConnection keeps the original position', () => {
    const model = new ConfigModel();
    model.addConnection({ label: 'a', hostname: 'a1' });
    model.addConnection({ label: 'b', hostname: 'b1' });
    model.replaceConnection({ label: 'a', hostname: 'a2' });
    expect([...model.listAll()].map((e) => e.connection.hostname)).toEqual(['a2', 'b1']);
  });

  it('listAll walks own connections before child groups', () => {
    const model = new ConfigModel();
    model.addConnection({ label: 'api', hostname: 'h', groupPath: ['work', 'prod'] });
    model.addConnection({ label: 'jump', hostname: 'h', groupPath: ['work'] });
    model.addConnection({ label: 'nas', hostname: 'h' });
    expect([...model.listAll()].map((e) => e.path.join('/'))).toEqual(['nas', 'work/jump', 'work/prod/api']);
  });

  it('listAll can be iterated more than once', () => {
    const model = new ConfigModel();
    model.addConnection({ label: 'a', hostname: 'h' });
    const entries = model.listAll();
    expect([...entries]).toHaveLength(1);
    expect([...entries]).toHaveLength(1);
  });

  it('groups() lists declared and implied groups depth-first', () => {
    const model = new ConfigModel();
    model.declareGroup(['empty']);
    model.addConnection({ label: 'db', hostname: 'h', groupPath: ['work', 'prod'] });
    expect(model.groups()).toEqual([
      { name: 'empty', parentPath: [] },
      { name: 'work', parentPath: [] },
      { name: 'prod', parentPath: ['work'] },
    ]);
  });

  it('accepts wildcard Host and Match pattern blocks', () => {
    const model = new ConfigModel();
    model.addPatternBlock({ keyword: 'Host', pattern: '*', directives: [['ServerAliveInterval', '60']], groupPath: [] });
    model.addPatternBlock({ keyword: 'Match', pattern: 'host *.internal', directives: [], groupPath: [] });
    expect(model.patternBlocks()).toHaveLength(2);
    expect(model.size).toBe(0);
  });

  it('rejects a pattern block that names a single host', () => {
    const model = new ConfigModel();
    expect(() =>
      model.addPatternBlock({ keyword: 'Host', pattern: 'web', directives: [], groupPath: [] })
    ).toThrow(InvalidConnectionError);
    expect(() =>
      model.addPatternBlock({ keyword: 'Host', pattern: 'web*', directives: [['HostName', 'x']], groupPath: [] })
    ).toThrow(InvalidConnectionError);
  });

  it('accepts a HostName on a block that lists several patterns', () => {
    const model = new ConfigModel();
    model.addPatternBlock({ keyword: 'Host', pattern: 'a b', directives: [['HostName', 'x']], groupPath: [] });
    expect(model.patternBlocks()).toHaveLength(1);
  });

  it('keeps connections and pattern blocks of a group in insertion order', () => {
    const model = new ConfigModel();
    model.addPatternBlock({ keyword: 'Host', pattern: '*', directives: [['User', 'root']], groupPath: [] });
    model.addConnection({ label: 'web', hostname: 'w' });
    model.addConnection({ label: 'db', hostname: 'd', groupPath: ['work'] });
    model.addPatternBlock({ keyword: 'Match', pattern: 'host *.internal', directives: [], groupPath: [] });

    expect(model.blocksIn([]).map((b) => (b.kind === 'connection' ? b.connection.label : b.block.pattern))).toEqual([
      '*',
      'web',
      'host *.internal',
    ]);
    expect([...model.blocks()].map((b) => (b.kind === 'connection' ? b.connection.label : b.block.pattern))).toEqual([
      '*',
      'web',
      'host *.internal',
      'db',
    ]);
    expect(model.blocksIn(['missing'])).toEqual([]);
  });

  it('equals is sensitive to the position of a pattern block', () => {
    const a = new ConfigModel();
    a.addPatternBlock({ keyword: 'Host', pattern: '*', directives: [], groupPath: [] });
    a.addConnection({ label: 'x', hostname: 'h' });
    const b = new ConfigModel();
    b.addConnection({ label: 'x', hostname: 'h' });
    b.addPatternBlock({ keyword: 'Host', pattern: '*', directives: [], groupPath: [] });
    expect(a.equals(b)).toBe(false);
    expect(a.clone().equals(a)).toBe(true);
  });

  it('clone is deep and equal', () => {
    const model = new ConfigModel();
    model.addConnection({ label: 'a', hostname: 'h', extraOptions: { Compression: 'yes' }, groupPath: ['g'] });
    model.addPatternBlock({ keyword: 'Host', pattern: '*', directives: [['User', 'me']], groupPath: [] });
    const copy = model.clone();
    expect(copy.equals(model)).toBe(true);

    copy.replaceConnection({ label: 'a', hostname: 'other', groupPath: ['g'] });
    expect(model.find(['g'], 'a').hostname).toBe('h');
    expect(copy.equals(model)).toBe(false);
  });

  it('equals is sensitive to connection order', () => {
    const a = new ConfigModel();
    a.addConnection({ label: 'x', hostname: 'h' });
    a.addConnection({ label: 'y', hostname: 'h' });
    const b = new ConfigModel();
    b.addConnection({ label: 'y', hostname: 'h' });
    b.addConnection({ label: 'x', hostname: 'h' });
    expect(a.equals(b)).toBe(false);
  });
});
