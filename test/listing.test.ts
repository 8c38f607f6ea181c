import { describe, expect, it } from 'vitest';

import { formatDiagnostic } from '../src/diagnostics/errors.js';
import {
  branch,
  createProcedure,
  ldarg,
  ldc,
  ldsfld,
  ldstr,
  local,
  ret,
  stloc,
} from '../src/il/builder.js';
import { formatInstruction, writeListing } from '../src/il/listing.js';
import { markerField } from './test-helpers.js';

describe('writeListing', () => {
  it('renders a deterministic listing with a header', () => {
    const top = ldc(1);
    const p = createProcedure('Main', [top, branch('br', top), ldstr('x'), ldarg(0), ret()]);
    expect(writeListing(p)).toBe(
      [
        '; Main',
        '; instructions: 5',
        'IL_0000: ldc.i4 1',
        'IL_0001: br IL_0000',
        'IL_0002: ldstr "x"',
        'IL_0003: ldarg A_0',
        'IL_0004: ret',
        '',
      ].join('\n'),
    );
  });

  it('honours the line ending option', () => {
    const p = createProcedure('Tiny', [ret()]);
    expect(writeListing(p, { header: false, lineEnding: '\r\n' })).toBe('IL_0000: ret\r\n');
  });
});

describe('formatInstruction', () => {
  it('formats symbols and locals', () => {
    expect(formatInstruction(ldsfld(markerField('KeyI0')))).toBe(
      'ldsfld Runtime.Mutation::KeyI0',
    );
    expect(formatInstruction(stloc(local(3)))).toBe('stloc V_3');
    expect(formatInstruction(stloc(local(3, 'state')))).toBe('stloc state');
  });

  it('marks targets that are not in the body', () => {
    expect(formatInstruction(branch('br', ret()), [])).toBe('br IL_????');
  });
});

describe('formatDiagnostic', () => {
  it('renders the procedure, location and id on one line', () => {
    expect(
      formatDiagnostic({
        id: 'MUT102',
        severity: 'error',
        message: 'Code requests mutation key KeyI1, but no value is set for it.',
        procedure: 'Broken',
        index: 26,
      }),
    ).toBe(
      'Broken@IL_001A: error MUT102: Code requests mutation key KeyI1, but no value is set for it.',
    );
    expect(
      formatDiagnostic({ id: 'MUT301', severity: 'error', message: 'x', procedure: '<module>' }),
    ).toBe('<module>: error MUT301: x');
  });
});
