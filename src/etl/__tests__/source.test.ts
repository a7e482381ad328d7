import { describe, it, expect } from 'vitest';
import { InvalidSourceRowError } from '../../errors.js';
import { csvRecord } from '../../__tests__/helpers.js';
import { parseSourceRows } from '../source.js';

describe('parseSourceRows', () => {
  it('coerces numbers and the Yes/No column', () => {
    const [row] = parseSourceRows([
      csvRecord({ Age: '21', Avg_Daily_Usage_Hours: '4.5', Affects_Academic_Performance: 'no' }),
    ]);

    expect(row).toMatchObject({
      Age: 21,
      Avg_Daily_Usage_Hours: 5,
      Affects_Academic_Performance: false,
      Sleep_Hours_Per_Night: 7,
    });
  });

  it('reports the file line of the failing row', () => {
    const parse = () =>
      parseSourceRows([csvRecord(), csvRecord(), csvRecord({ Addicted_Score: 'high' })]);

    expect(parse).toThrow(InvalidSourceRowError);
    expect(parse).toThrow('Source row 4 failed validation');
  });

  it.each(['Age', 'Avg_Daily_Usage_Hours', 'Sleep_Hours_Per_Night', 'Conflicts_Over_Social_Media'])(
    'rejects a blank %s cell instead of reading it as zero',
    (column) => {
      const parse = () => parseSourceRows([csvRecord({ [column]: ' ' })]);

      expect(parse).toThrow(InvalidSourceRowError);
      expect(parse).toThrow('Source row 2 failed validation');
    }
  );

  it('names the blank column in the issues', () => {
    try {
      parseSourceRows([csvRecord({ Age: '' })]);
      expect.unreachable('blank Age was accepted');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidSourceRowError);
      expect(error).toMatchObject({
        details: { row: 2, issues: [expect.objectContaining({ path: ['Age'], message: 'value is required' })] },
      });
    }
  });

  it('rejects a flag that is neither yes nor no', () => {
    expect(() => parseSourceRows([csvRecord({ Affects_Academic_Performance: 'maybe' })])).toThrow(
      InvalidSourceRowError
    );
  });
});
