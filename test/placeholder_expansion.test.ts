import { describe, expect, it } from 'vitest';

import { isConfigurationError } from '../src/diagnostics/errors.js';
import {
  branch,
  call,
  createProcedure,
  ldc,
  ldloc,
  ldsfld,
  local,
  methodRef,
  op,
  ret,
  stloc,
} from '../src/il/builder.js';
import { formatInstruction } from '../src/il/listing.js';
import type { Instruction } from '../src/il/types.js';
import type { PlaceholderProcessor } from '../src/mutation/placeholder.js';
import {
  Mutation,
  bodyLines,
  captureMutationError,
  markerField,
  newProcessor,
  placeholderMethod,
} from './test-helpers.js';

const v0 = local(0);
const v1 = local(1);
const v2 = local(2);

describe('placeholder expansion', () => {
  it('splices the processor output in place of the argument span and the call', () => {
    const a1 = ldloc(v0);
    const a2 = op('not');
    const marker = call(placeholderMethod);
    const p = createProcedure('Main', [a1, a2, marker, stloc(v1), ret()], { locals: [v0, v1] });

    const seen: Instruction[][] = [];
    const processor = newProcessor();
    processor.placeholderProcessor = (arg) => {
      seen.push([...arg]);
      return [ldloc(v0), ldc(0x55), op('xor')];
    };
    processor.process(p);

    expect(seen).toHaveLength(1);
    expect(seen[0]?.[0]).toBe(a1);
    expect(seen[0]?.[1]).toBe(a2);
    expect(seen[0]).toHaveLength(2);
    expect(bodyLines(p)).toEqual([
      'IL_0000: ldloc V_0',
      'IL_0001: ldc.i4 85',
      'IL_0002: xor',
      'IL_0003: stloc V_1',
      'IL_0004: ret',
    ]);
    expect(p.body).not.toContain(a1);
    expect(p.body).not.toContain(a2);
    expect(p.body).not.toContain(marker);
  });

  it('visits every original instruction once across several expansions', () => {
    const p = createProcedure(
      'Main',
      [
        ldsfld(markerField('KeyI0')),
        call(placeholderMethod),
        ldloc(v0),
        call(placeholderMethod),
        stloc(v1),
        ldsfld(markerField('KeyI1')),
        stloc(v2),
        ret(),
      ],
      { locals: [v0, v1, v2] },
    );

    const seen: string[][] = [];
    const transform: PlaceholderProcessor = (arg) => {
      seen.push(arg.map((i) => formatInstruction(i)));
      return [...arg, ldc(0x10), op('xor')];
    };
    const processor = newProcessor({ KeyI0: 5, KeyI1: 9 });
    processor.placeholderProcessor = transform;
    processor.process(p);

    expect(seen).toEqual([['ldc.i4 5'], ['ldloc V_0']]);
    expect(bodyLines(p)).toEqual([
      'IL_0000: ldc.i4 5',
      'IL_0001: ldc.i4 16',
      'IL_0002: xor',
      'IL_0003: ldloc V_0',
      'IL_0004: ldc.i4 16',
      'IL_0005: xor',
      'IL_0006: stloc V_1',
      'IL_0007: ldc.i4 9',
      'IL_0008: stloc V_2',
      'IL_0009: ret',
    ]);
  });

  it('accepts an empty replacement', () => {
    const p = createProcedure('Main', [ldc(1), call(placeholderMethod), ret()]);
    const processor = newProcessor();
    processor.placeholderProcessor = () => [];
    processor.process(p);
    expect(bodyLines(p)).toEqual(['IL_0000: ret']);
  });

  it('redirects branches aimed at the start of the argument span', () => {
    const a1 = ldloc(v0);
    const jump = branch('br', a1);
    const p = createProcedure('Main', [jump, a1, call(placeholderMethod), stloc(v1), ret()]);
    const processor = newProcessor();
    processor.placeholderProcessor = () => [ldc(42)];
    processor.process(p);

    expect(bodyLines(p)).toEqual([
      'IL_0000: br IL_0001',
      'IL_0001: ldc.i4 42',
      'IL_0002: stloc V_1',
      'IL_0003: ret',
    ]);
    expect(jump.operand).toBe(p.body[1]);
  });

  it('fails with a trace failure when the argument comes from a shared producer', () => {
    const p = createProcedure('Main', [ldc(1), op('dup'), call(placeholderMethod), op('add'), ret()]);
    const processor = newProcessor();
    processor.placeholderProcessor = (arg) => arg;

    const err = captureMutationError(() => processor.process(p));
    expect(err.id).toBe('MUT200');
    expect(err.index).toBe(2);
    expect(err.message).toBe(
      'Failed to trace placeholder argument: dup at IL_0001 produces more than one argument.',
    );
  });

  it('fails with a trace failure when a branch lands inside the argument span', () => {
    const inner = op('not');
    const p = createProcedure('Main', [
      ldloc(v0),
      branch('brtrue', inner),
      ldc(1),
      inner,
      call(placeholderMethod),
      ret(),
    ]);
    const processor = newProcessor();
    processor.placeholderProcessor = (arg) => arg;

    const err = captureMutationError(() => processor.process(p));
    expect(err.id).toBe('MUT200');
    expect(err.message).toBe(
      'Failed to trace placeholder argument: branch target at IL_0003 inside the argument span.',
    );
  });

  it('fails with a trace failure when nothing produces the argument', () => {
    const p = createProcedure('Main', [call(placeholderMethod), ret()]);
    const processor = newProcessor();
    processor.placeholderProcessor = (arg) => arg;

    const err = captureMutationError(() => processor.process(p));
    expect(err.id).toBe('MUT200');
    expect(err.message).toBe(
      'Failed to trace placeholder argument: argument 0 has no producer before IL_0000.',
    );
  });

  it('fails when the redirected branch would have no instruction left to land on', () => {
    const a1 = ldloc(v0);
    const jump = branch('br', a1);
    const p = createProcedure('Main', [jump, a1, call(placeholderMethod)], { locals: [v0] });
    const processor = newProcessor();
    processor.placeholderProcessor = () => [];

    const err = captureMutationError(() => processor.process(p));
    expect(err.id).toBe('MUT105');
    expect(err.index).toBe(1);
    expect(err.message).toBe('Branch target removed with nothing left to redirect it to.');
  });

  it('rejects a span start from the tracer that lies outside the body', () => {
    for (const start of [-1, 0.5]) {
      const p = createProcedure('Main', [ldc(1), call(placeholderMethod), ret()]);
      const processor = newProcessor(
        {},
        { tracer: { trace: () => ({ traceArguments: () => ({ kind: 'ok', starts: [start] }) }) } },
      );
      processor.placeholderProcessor = (arg) => arg;

      const err = captureMutationError(() => processor.process(p));
      expect(err.id).toBe('MUT200');
      expect(err.index).toBe(1);
      expect(err.message).toBe(
        `Failed to trace placeholder argument: span start ${String(start)} is outside the body.`,
      );
      expect(bodyLines(p)[0]).toBe('IL_0000: ldc.i4 1');
    }
  });

  it('fails as a configuration error when no processor is set', () => {
    const p = createProcedure('Main', [ldc(1), call(placeholderMethod), ret()]);
    const err = captureMutationError(() => newProcessor().process(p));

    expect(err.id).toBe('MUT300');
    expect(isConfigurationError(err)).toBe(true);
    expect(bodyLines(p)).toEqual([
      'IL_0000: ldc.i4 1',
      'IL_0001: call Runtime.Mutation::Placeholder/1',
      'IL_0002: ret',
    ]);
  });

  it('rejects placeholder overloads that do not take exactly one argument', () => {
    const twoArgs = methodRef(Mutation, 'Placeholder', { paramCount: 2 });
    const p = createProcedure('Main', [ldc(1), ldc(2), call(twoArgs), ret()]);
    const processor = newProcessor();
    processor.placeholderProcessor = (arg) => arg;

    const err = captureMutationError(() => processor.process(p));
    expect(err.id).toBe('MUT100');
    expect(err.message).toBe(
      'Mutation placeholder must take exactly one argument (Placeholder takes 2).',
    );
  });
});
