import type { CellValue } from '@retail-etl/types';
import { createDataset, fromRows, rowCount, toRows } from '../TabularDataset';
import {
  deriveColumn,
  dropMissing,
  dropRowsWhere,
  fillMissing,
  mapColumn,
  oneHotExpand,
  renameColumn,
  renameLastColumn,
  replaceValues,
  runStages,
  selectColumns,
  setConstant
} from '../stages';
import { MissingColumnError, StructuralMismatchError } from '../../utils/errorUtils';

const context = 'test stages';

describe('TabularDataset', () => {
  it('should reject columns of different lengths', () => {
    expect(() => createDataset(['a', 'b'], { a: ['1', '2'], b: ['1'] })).toThrow(StructuralMismatchError);
  });

  it('should reject duplicate column names', () => {
    expect(() => createDataset(['a', 'a'], { a: ['1'] })).toThrow('Duplicate column "a"');
  });

  it('should hold a column named __proto__ as an own key', () => {
    const dataset = createDataset(['__proto__', 'id'], { ['__proto__']: ['x'], id: ['1'] });
    const renamed = renameColumn('id', 'key')(dataset, context);

    expect(Object.keys(renamed.data)).toEqual(['__proto__', 'key']);
    expect(renamed.data['__proto__']).toEqual(['x']);
  });

  it('should build from rows, filling absent keys with null', () => {
    const first: Record<string, CellValue> = { a: '1' };
    const second: Record<string, CellValue> = { a: '2', b: 'x' };
    const dataset = fromRows([first, second]);

    expect(dataset.columns).toEqual(['a', 'b']);
    expect(dataset.data.b).toEqual([null, 'x']);
    expect(rowCount(dataset)).toBe(2);
    expect(toRows(dataset)).toEqual([{ a: '1', b: null }, { a: '2', b: 'x' }]);
  });
});

describe('stages', () => {
  const base = fromRows([
    { id: '1', name: 'Ann', code: 'M' },
    { id: null, name: 'Bob', code: 'S' },
    { id: '3', name: null, code: 'X' }
  ]);

  it('should drop rows and keep every column aligned', () => {
    const result = dropMissing('id')(base, context);

    expect(toRows(result)).toEqual([
      { id: '1', name: 'Ann', code: 'M' },
      { id: '3', name: null, code: 'X' }
    ]);
  });

  it('should return the same dataset when no row is dropped', () => {
    expect(dropRowsWhere('code', () => false)(base, context)).toBe(base);
  });

  it('should fail with MissingColumnError naming the caller', () => {
    expect(() => mapColumn('missing', value => value)(base, context)).toThrow(MissingColumnError);
    expect(() => dropMissing('missing')(base, context)).toThrow(/required by test stages/);
  });

  it('should rename a column in place', () => {
    const result = renameColumn('name', 'FirstName')(base, context);

    expect(result.columns).toEqual(['id', 'FirstName', 'code']);
    expect(result.data.FirstName).toEqual(['Ann', 'Bob', null]);
  });

  it('should skip an optional rename when the target already exists', () => {
    const fixed = fromRows([{ LastName: 'Yang' }]);

    expect(renameColumn('LastNa', 'LastName', { ifPresent: true })(fixed, context)).toBe(fixed);
    expect(() => renameColumn('LastNa', 'LastName')(fixed, context)).toThrow(MissingColumnError);
  });

  it('should refuse to rename onto another existing column', () => {
    expect(() => renameColumn('name', 'code')(base, context)).toThrow(StructuralMismatchError);
  });

  it('should rename the last column only when needed', () => {
    expect(renameLastColumn('code')(base, context)).toBe(base);
    expect(renameLastColumn('Quantity')(base, context).columns).toEqual(['id', 'name', 'Quantity']);
  });

  it('should set a constant, creating the column when absent', () => {
    const result = setConstant('level', 'College Degree')(base, context);

    expect(result.columns).toEqual(['id', 'name', 'code', 'level']);
    expect(result.data.level).toEqual(['College Degree', 'College Degree', 'College Degree']);
  });

  it('should replace only exact string matches', () => {
    const result = replaceValues('code', { M: 'Married', S: 'Single' })(base, context);

    expect(result.data.code).toEqual(['Married', 'Single', 'X']);
  });

  it('should fill missing values', () => {
    expect(fillMissing('name', 'Unknown')(base, context).data.name).toEqual(['Ann', 'Bob', 'Unknown']);
  });

  it('should derive a new column from a source column', () => {
    const result = deriveColumn('idLength', 'id', value => (value === null ? 0 : String(value).length))(base, context);

    expect(result.columns[3]).toBe('idLength');
    expect(result.data.idLength).toEqual([1, 0, 1]);
  });

  it('should select columns in the requested order', () => {
    expect(selectColumns(['code', 'id'])(base, context).columns).toEqual(['code', 'id']);
  });

  it('should run stages in order', () => {
    const result = runStages(base, [dropMissing('id'), replaceValues('code', { M: 'Married' })], context);

    expect(result.data.code).toEqual(['Married', 'X']);
  });

  describe('oneHotExpand', () => {
    it('should create one sorted boolean column per distinct token', () => {
      const dataset = fromRows([
        { key: '1', tags: 'Twitter, Facebook', other: 'x' },
        { key: '2', tags: 'Facebook', other: 'y' },
        { key: '3', tags: null, other: 'z' }
      ]);

      const result = oneHotExpand('tags', ', ', ['key'])(dataset, context);

      expect(result.columns).toEqual(['key', 'Facebook', 'Twitter']);
      expect(toRows(result)).toEqual([
        { key: '1', Facebook: true, Twitter: true },
        { key: '2', Facebook: true, Twitter: false },
        { key: '3', Facebook: false, Twitter: false }
      ]);
    });

    it('should keep tokens named after object prototype members as columns', () => {
      const dataset = fromRows([
        { key: '1', tags: '__proto__, constructor' },
        { key: '2', tags: 'constructor' }
      ]);

      const result = oneHotExpand('tags', ', ', ['key'])(dataset, context);

      expect(result.columns).toEqual(['key', '__proto__', 'constructor']);
      expect(Object.keys(result.data)).toEqual(['key', '__proto__', 'constructor']);
      expect(result.data['__proto__']).toEqual([true, false]);
      expect(result.data.constructor).toEqual([true, true]);
    });

    it('should reject a token that collides with a kept column', () => {
      const dataset = fromRows([{ key: '1', tags: 'key' }]);

      expect(() => oneHotExpand('tags', ', ', ['key'])(dataset, context)).toThrow(StructuralMismatchError);
    });
  });
});
