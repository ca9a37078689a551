import { describe, it, expect } from 'vitest';
import {
  createEntityPipeline,
  createMoneyPipeline,
} from '../../../../src/services/transform/presets.js';
import { TableValidationError, type Row } from '../../../../src/services/transform/table.js';
import {
  MONEY_TABLE_COLUMNS,
  ENTITY_TABLE_COLUMNS,
} from '../../../../src/services/output/writers.js';
import { KeywordEmbedder } from '../helpers.js';

function moneyRow(overrides: Partial<Row> = {}): Row {
  return {
    document_id: 'doc-1',
    value: 500000,
    currency: 'EUR',
    context: 'maximum grant',
    original_sentence: 'The maximum grant is EUR 500,000.',
    ...overrides,
  };
}

describe('createMoneyPipeline', () => {
  it('keeps positive euro amounts about the call budget', async () => {
    const kept = moneyRow();
    const amif = moneyRow({
      value: 90000,
      currency: '€',
      context: 'co-financing',
      original_sentence: 'The AMIF contribution is 90,000 €.',
    });
    const output = await createMoneyPipeline().run({
      columns: [...MONEY_TABLE_COLUMNS],
      rows: [
        kept,
        moneyRow({ value: 0, original_sentence: 'A grant of 0 EUR.' }),
        moneyRow({ currency: 'USD' }),
        moneyRow({
          currency: 'euros',
          context: 'staff costs',
          original_sentence: 'Staff costs of 20,000 euros.',
        }),
        amif,
      ],
    });
    expect(output.rows).toEqual([kept, amif]);
  });

  it('rejects negative amounts', async () => {
    await expect(
      createMoneyPipeline().run({ columns: [...MONEY_TABLE_COLUMNS], rows: [moneyRow({ value: -1 })] })
    ).rejects.toThrow(TableValidationError);
  });

  it('rejects a sentence without any digit', async () => {
    await expect(
      createMoneyPipeline().run({
        columns: [...MONEY_TABLE_COLUMNS],
        rows: [moneyRow({ original_sentence: 'The maximum grant is given above.' })],
      })
    ).rejects.toThrow("Row 0, column 'original_sentence' does not satisfy");
  });

  it('ends with semantic dedup only when dedup options are given', () => {
    expect(createMoneyPipeline().stepNames).not.toContain('removeSemanticDuplicates');
    const withDedup = createMoneyPipeline({ embedder: new KeywordEmbedder([]) });
    expect(withDedup.stepNames[withDedup.stepNames.length - 1]).toBe('removeSemanticDuplicates');
  });
});

describe('createEntityPipeline', () => {
  it('produces one row per document with stacked types', async () => {
    const output = await createEntityPipeline().run({
      columns: [...ENTITY_TABLE_COLUMNS],
      rows: [
        { document_id: 'doc-1', organization_type: 'coordinator', min_entities: [3, 3] },
        { document_id: 'doc-1', organization_type: 'beneficiary', min_entities: [3, 3] },
        { document_id: 'doc-2', organization_type: 'partner', min_entities: [2] },
      ],
    });
    expect(output.rows).toEqual([
      { document_id: 'doc-1', organization_type: ['coordinator', 'beneficiary'], min_entities: [3] },
      { document_id: 'doc-2', organization_type: ['partner'], min_entities: [2] },
    ]);
  });

  it('rejects non-integer minimums', async () => {
    await expect(
      createEntityPipeline().run({
        columns: [...ENTITY_TABLE_COLUMNS],
        rows: [{ document_id: 'doc-1', organization_type: 'partner', min_entities: [1.5] }],
      })
    ).rejects.toThrow('is not an integer');
  });
});
