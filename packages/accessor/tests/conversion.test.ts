import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  bindRecordType,
  convertTo,
  convertToScalar,
  createAccessor,
  createMappingTranscoder,
  defineRecordType,
  jsonTranscoder,
  mappingTranscoder,
  type MappingTranscoder,
} from '../src/index.js';
import { userSummaryType, userType, type User } from './fixtures/user.js';

interface UserSnapshot {
  name: string;
  updatedDate: Date | null;
}

const snapshotType = defineRecordType<UserSnapshot>({
  name: 'UserSnapshot',
  create: () => ({ name: '', updatedDate: null }),
  fields: {
    name: { kind: 'string' },
    updatedDate: { kind: 'date', nullable: true },
  },
});

function sampleUser(): User {
  return bindRecordType<User>(
    {
      id: 7,
      name: 'Ada',
      email: 'ada@example.com',
      description: null,
      createdDate: new Date(0),
      updatedDate: new Date(1000),
      isActive: true,
    },
    userType
  );
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('convertTo', () => {
  it('returns the source itself when it already is the target type', () => {
    const user = sampleUser();

    expect(convertTo(user, userType)).toBe(user);
  });

  it('rebuilds the source as another record type', () => {
    expect(convertTo(sampleUser(), userSummaryType)).toEqual({ id: 7, name: 'Ada', isActive: true });
  });

  it('converts field values on the way', () => {
    const summary = convertTo({ id: '5', name: 'Ada', isActive: 'true' }, userSummaryType);

    expect(summary).toEqual({ id: 5, name: 'Ada', isActive: true });
    expect(userSummaryType.is(summary)).toBe(true);
  });

  it('fails when a shared field rejects its value', () => {
    expect(convertTo({ id: 'five', name: 'Ada' }, userSummaryType)).toBeUndefined();
  });

  it('returns undefined for absent and non-record sources', () => {
    expect(convertTo(null, userSummaryType)).toBeUndefined();
    expect(convertTo(42, userSummaryType)).toBeUndefined();
    expect(convertTo('Ada', userSummaryType)).toBeUndefined();
  });

  it('keeps zero values for rejected fields with a lenient transcoder', () => {
    const lenient = createAccessor({ transcoder: createMappingTranscoder({ strict: false }) });

    expect(lenient.convertTo({ id: 'five', name: 'Ada' }, userSummaryType)).toEqual({
      id: 0,
      name: 'Ada',
      isActive: false,
    });
  });

  it('accepts values JSON cannot hold with the mapping transcoder', () => {
    expect(convertTo({ id: BigInt(10) }, userSummaryType)).toEqual({ id: 10, name: '', isActive: false });
  });

  it('reports an unencodable source as absent with the JSON transcoder', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const accessor = createAccessor({ transcoder: jsonTranscoder });

    expect(accessor.convertTo({ id: BigInt(10) }, userSummaryType)).toBeUndefined();
    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0]?.[0])).toMatch(/ WARN UserSummary Conversion failed\n$/);
  });

  it('restores dates from their JSON text', () => {
    const accessor = createAccessor({ transcoder: jsonTranscoder });

    expect(accessor.convertTo(sampleUser(), snapshotType)).toEqual({
      name: 'Ada',
      updatedDate: new Date(1000),
    });
  });

  it('uses an injected transcoder', () => {
    const lowercasing: MappingTranscoder = {
      encode: (record, context) =>
        new Map(Array.from(context.toMapping(record), ([name, value]): [string, unknown] => [name.toLowerCase(), value])),
      decode: (mapping, type, context) => mappingTranscoder.decode(mapping, type, context),
    };
    const accessor = createAccessor({ transcoder: lowercasing });

    expect(accessor.convertTo({ ID: 3, NAME: 'Ada' }, userSummaryType)).toEqual({
      id: 3,
      name: 'Ada',
      isActive: false,
    });
  });
});

describe('convertToScalar', () => {
  it('converts to numbers and integers', () => {
    expect(convertToScalar('42', 'number')).toBe(42);
    expect(convertToScalar(4.6, 'integer')).toBe(5);
    expect(convertToScalar('4.6', 'integer')).toBe(0);
    expect(convertToScalar('abc', 'number')).toBe(0);
    expect(convertToScalar('9'.repeat(400), 'integer')).toBe(0);
    expect(convertToScalar(BigInt(10) ** BigInt(400), 'number')).toBe(0);
  });

  it('converts to booleans', () => {
    expect(convertToScalar('TRUE', 'boolean')).toBe(true);
    expect(convertToScalar(2, 'boolean')).toBe(true);
    expect(convertToScalar('yes', 'boolean')).toBe(false);
  });

  it('converts to strings and dates', () => {
    expect(convertToScalar(true, 'string')).toBe('true');
    expect(convertToScalar('2024-03-01T00:00:00.000Z', 'date')).toEqual(new Date(Date.UTC(2024, 2, 1)));
  });

  it('returns the zero value for absent input', () => {
    expect(convertToScalar(undefined, 'string')).toBe('');
    expect(convertToScalar(null, 'date').getTime()).toBe(0);
  });

  it('follows the accessor configuration', () => {
    const accessor = createAccessor({ config: { coercion: { numericStrings: false } } });

    expect(accessor.convertToScalar('42', 'number')).toBe(0);
  });
});
