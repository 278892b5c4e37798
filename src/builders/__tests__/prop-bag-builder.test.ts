/**
 * prop-bag-builder.test.ts
 *
 * Covers base props from the session and layer precedence.
 */

import type { SessionSource } from '../../models/http.js';
import { PropBagBuilder } from '../prop-bag-builder.js';

describe('PropBagBuilder', () => {
  it('provides empty base props without a session', () => {
    const bag = PropBagBuilder.build(undefined, []);
    expect([...bag.keys()]).toEqual(['errors', 'flash', 'auth']);
    expect(bag.get('errors')).toEqual({});
    expect(bag.get('flash')).toEqual({});
  });

  it('resolves the user lazily from the session', () => {
    const user = jest.fn(() => ({ id: 7 }));
    const session: SessionSource = { user };
    const auth = PropBagBuilder.baseProps(session)['auth'];
    expect(user).not.toHaveBeenCalled();
    expect(auth).toEqual({ user: expect.any(Function) });
  });

  it('keeps the first message per field and drops empty flash values', () => {
    const session: SessionSource = {
      errors: () => ({ email: ['taken', 'invalid'], name: 'required', empty: [] }),
      flash: (kind) => (kind === 'success' ? 'Saved' : kind === 'error' ? '' : null),
    };
    const base = PropBagBuilder.baseProps(session);
    expect(base['errors']).toEqual({ email: 'taken', name: 'required' });
    expect(base['flash']).toEqual({ success: 'Saved' });
  });

  it('keeps error fields named like Object.prototype members', () => {
    const fields: [string, string[]][] = [['__proto__', ['bad']]];
    const errors = PropBagBuilder.firstMessages(Object.fromEntries(fields));
    expect(Object.entries(errors)).toEqual([['__proto__', 'bad']]);
  });

  it('lets later layers win while keeping first insertion order', () => {
    const bag = PropBagBuilder.build(undefined, [
      new Map<string, unknown>([['title', 'shared'], ['appName', 'Acme']]),
      new Map<string, unknown>([['title', 'request']]),
      new Map<string, unknown>([['title', 'page'], ['errors', { field: 'x' }]]),
    ]);
    expect([...bag.keys()]).toEqual(['errors', 'flash', 'auth', 'title', 'appName']);
    expect(bag.get('title')).toBe('page');
    expect(bag.get('errors')).toEqual({ field: 'x' });
  });
});
