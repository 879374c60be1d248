import { describe, it, expectTypeOf } from 'vitest';
import type { Displayable, FormatArgs } from './Template.js';
import { info } from '../../application/Tracing.js';

describe('FormatArgs', () => {
  it('should demand one argument per automatic field', () => {
    expectTypeOf<FormatArgs<'a {} {:x}'>>().toEqualTypeOf<[Displayable, Displayable]>();
    expectTypeOf<FormatArgs<'no fields'>>().toEqualTypeOf<[]>();
    expectTypeOf<FormatArgs<'{{}} {}'>>().toEqualTypeOf<[Displayable]>();
  });

  it('should fall back to any number of arguments', () => {
    expectTypeOf<FormatArgs<'{0} {1}'>>().toEqualTypeOf<Displayable[]>();
    expectTypeOf<FormatArgs<string>>().toEqualTypeOf<Displayable[]>();
  });

  it('should check emission calls', () => {
    // @ts-expect-error missing argument
    info('x {}');
    // @ts-expect-error extra argument
    info('x', 1);

    info('user {}', { user: 'test-user' });
  });
});
