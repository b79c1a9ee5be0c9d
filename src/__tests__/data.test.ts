import { describe, it, expect } from 'vitest';
import {
  parseDelimited,
  parseCountTable,
  guessSampleSheetColumns,
  parseSampleSheet,
  formatResultsTable,
  formatMatrix,
  formatPca,
} from '../data';
import type { FitResult } from '../analysis/glm';
import { ConfigurationError, ParseError } from '../errors';

// ═══════════════════════════════════════════════════════════
//  parseDelimited
// ═══════════════════════════════════════════════════════════
describe('parseDelimited', () => {
  it('reads CSV and trims cells', () => {
    expect(parseDelimited('a, b\n1 ,2\n')).toEqual({ headers: ['a', 'b'], rows: [['1', '2']] });
  });

  it('detects tabs', () => {
    expect(parseDelimited('a\tb\n1\t2').rows).toEqual([['1', '2']]);
  });

  it('skips blank lines', () => {
    expect(parseDelimited('a,b\n\n1,2\n\n').rows).toHaveLength(1);
  });

  it('needs a header and at least one row', () => {
    expect(() => parseDelimited('a,b')).toThrow(ParseError);
  });
});

// ═══════════════════════════════════════════════════════════
//  parseCountTable
// ═══════════════════════════════════════════════════════════
describe('parseCountTable', () => {
  const TSV = 'gene\tc1\tc2\tt1\n' +
    'ENSG01\t10\t0\t7\n' +
    'ENSG02\t3\t5\t12\n';

  it('reads genes, samples and counts', () => {
    const m = parseCountTable(TSV);
    expect(m.genes).toEqual(['ENSG01', 'ENSG02']);
    expect(m.samples).toEqual(['c1', 'c2', 't1']);
    expect(Array.from(m.values())).toEqual([10, 0, 7, 3, 5, 12]);
  });

  it('drops annotation columns', () => {
    const m = parseCountTable('gene,length,s1,s2\ng1,1500,4,5\n', { dropColumns: ['length'] });
    expect(m.samples).toEqual(['s1', 's2']);
    expect(Array.from(m.values())).toEqual([4, 5]);
  });

  it('reports non-numeric cells with their line', () => {
    const text = 'gene,s1,s2\ng1,1,2\ng2,3,abc\n';
    expect(() => parseCountTable(text)).toThrow("Non-numeric count 'abc' for gene 'g2' in column 's2' (line 3)");
  });

  it('reports empty cells', () => {
    expect(() => parseCountTable('gene,s1,s2\ng1,,2\n')).toThrow(/Non-numeric count '' .* \(line 2\)/);
  });

  it('reports short rows', () => {
    expect(() => parseCountTable('gene,s1,s2\ng1,1\n')).toThrow('Expected 3 fields, found 2 (line 2)');
  });

  it('rejects negative counts through the matrix validation', () => {
    expect(() => parseCountTable('gene,s1,s2\ng1,1,-4\n')).toThrow(ConfigurationError);
  });

  it('rejects duplicate genes', () => {
    expect(() => parseCountTable('gene,s1\ng1,1\ng1,2\n')).toThrow(/Duplicate gene/);
  });
});

// ═══════════════════════════════════════════════════════════
//  Sample sheets
// ═══════════════════════════════════════════════════════════
describe('guessSampleSheetColumns', () => {
  it('matches common header names', () => {
    expect(guessSampleSheetColumns(['batch', 'condition', 'sample_id'])).toEqual({ sampleCol: 2, conditionCol: 1 });
  });

  it('falls back to the first two columns', () => {
    expect(guessSampleSheetColumns(['x', 'y'])).toEqual({ sampleCol: 0, conditionCol: 1 });
  });

  it('avoids the condition column when only it is recognised', () => {
    expect(guessSampleSheetColumns(['group', 'who'])).toEqual({ sampleCol: 1, conditionCol: 0 });
  });
});

describe('parseSampleSheet', () => {
  it('guesses columns', () => {
    const sheet = 'sample,condition\nc1,control\nt1,treated\n';
    expect(parseSampleSheet(sheet)).toEqual([
      { sample: 'c1', condition: 'control' },
      { sample: 't1', condition: 'treated' },
    ]);
  });

  it('uses named columns', () => {
    const sheet = 'run,batch,dex\nr1,b1,untrt\nr2,b2,trt\n';
    expect(parseSampleSheet(sheet, { sampleColumn: 'run', conditionColumn: 'dex' })).toEqual([
      { sample: 'r1', condition: 'untrt' },
      { sample: 'r2', condition: 'trt' },
    ]);
  });

  it('rejects unknown column names', () => {
    expect(() => parseSampleSheet('sample,condition\nc1,x\n', { conditionColumn: 'group' }))
      .toThrow("Column 'group' not found; available: sample, condition (line 1)");
  });

  it('rejects empty cells', () => {
    expect(() => parseSampleSheet('sample,condition\nc1,\n')).toThrow(/line 2/);
  });
});

// ═══════════════════════════════════════════════════════════
//  Export
// ═══════════════════════════════════════════════════════════
describe('formatResultsTable', () => {
  it('writes NA for missing values', () => {
    const rows: FitResult[] = [
      {
        gene: 'g1', baseMean: 55, log2FoldChange: -2.5, lfcSE: 0.25, statistic: -10, pvalue: 0.001, padj: 0.002,
        status: 'ok', dispersionOutlier: true,
      },
      {
        gene: 'g2', baseMean: 0, log2FoldChange: null, lfcSE: null, statistic: null, pvalue: null, padj: null,
        status: 'allZero', dispersionOutlier: false,
      },
    ];
    expect(formatResultsTable(rows)).toBe(
      'gene,baseMean,log2FoldChange,lfcSE,statistic,pvalue,padj,status,dispersionOutlier\n' +
      'g1,55,-2.5,0.25,-10,0.001,0.002,ok,TRUE\n' +
      'g2,0,NA,NA,NA,NA,NA,allZero,FALSE',
    );
  });
});

describe('formatMatrix', () => {
  it('writes one row per gene', () => {
    const text = formatMatrix({
      genes: ['g1', 'g2'],
      samples: ['a', 'b'],
      values: Float64Array.of(1, 2.5, NaN, 4),
      policy: 'pseudo-log2',
      blind: true,
      trend: null,
    });
    expect(text).toBe('gene,a,b\ng1,1,2.5\ng2,NA,4');
  });
});

describe('formatPca', () => {
  it('writes coordinates per sample', () => {
    const text = formatPca({
      samples: [
        { sample: 'a', group: 'ctl', coordinates: [1.5, -2] },
        { sample: 'b', group: null, coordinates: [-1.5, 2] },
      ],
      explainedVariance: [0.9, 0.1],
      genesUsed: ['g1'],
      degenerate: false,
      converged: true,
    });
    expect(text).toBe('sample,group,PC1,PC2\na,ctl,1.5,-2\nb,NA,-1.5,2');
  });
});
