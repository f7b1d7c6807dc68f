/**
 * Unit tests for the sales export text format
 */

import {
  COLUMN_COUNT,
  formatDateTime,
  formatHeader,
  formatRow,
  parseCsvLine,
  quoteField,
  transactionRows,
} from '../../../src/services/export/export.format';
import { EXPORT_LABELS } from '../../../src/services/export/export.labels';
import {
  AgeGroup,
  Gender,
  MarketingChannel,
  Product,
  Transaction,
} from '../../../src/types/sales';

const products: Product[] = [
  { id: 'a', kind: 'simple', name: 'Zine "Vol. 2"', price: 500, imageRef: null, inventoryManaged: true, stock: 3 },
  { id: 'b', kind: 'simple', name: 'Badge', price: 300, imageRef: null, inventoryManaged: false, stock: 0 },
];
const lookup = { findProduct: (id: string) => products.find((p) => p.id === id) };
const events = { eventName: (id: string) => (id === 'e1' ? 'Spring, Fair' : '') };

const sale: Transaction = {
  id: 't1',
  date: new Date(2024, 4, 3, 14, 5, 9),
  items: [
    { id: 'i1', productId: 'a', quantity: 2 },
    { id: 'i2', productId: 'gone', quantity: 1 },
    { id: 'i3', productId: 'b', quantity: 1 },
  ],
  ageGroup: AgeGroup.THIRTIES,
  gender: Gender.FEMALE,
  channel: MarketingChannel.SAMPLE_BOOK,
  isExhibitor: true,
  isAcquaintance: false,
  isCashless: true,
  isReserved: false,
  notes: 'line one\nline two',
  eventId: 'e1',
};

describe('Export format', () => {
  describe('formatDateTime', () => {
    it('should render local time as yyyy-MM-dd HH:mm:ss', () => {
      expect(formatDateTime(new Date(2024, 0, 9, 8, 7, 6))).toBe('2024-01-09 08:07:06');
    });
  });

  describe('quoteField', () => {
    it('should wrap values in quotes and double embedded quotes', () => {
      expect(quoteField('say "hi"')).toBe('"say ""hi"""');
    });
  });

  describe('formatHeader', () => {
    it('should write the fixed unquoted header line', () => {
      expect(formatHeader(EXPORT_LABELS.en)).toBe(
        'Event,DateTime,ProductName,Quantity,UnitPrice,Amount,AgeGroup,Gender,Channel,' +
          'Exhibitor,Acquaintance,Cashless,Reserved,Notes\n'
      );
    });

    it('should have one label per column in every locale', () => {
      expect(EXPORT_LABELS.en.header).toHaveLength(COLUMN_COUNT);
      expect(EXPORT_LABELS.ja.header).toHaveLength(COLUMN_COUNT);
    });
  });

  describe('transactionRows', () => {
    it('should emit one row per resolvable item with current catalog values', () => {
      const rows = transactionRows(sale, lookup, events, EXPORT_LABELS.en);

      expect(rows).toEqual([
        [
          'Spring, Fair',
          '2024-05-03 14:05:09',
          'Zine "Vol. 2"',
          '2',
          '500',
          '1000',
          '30-39',
          'Female',
          'Sample book',
          '1',
          '0',
          '1',
          '0',
          'line one line two',
        ],
        [
          'Spring, Fair',
          '2024-05-03 14:05:09',
          'Badge',
          '1',
          '300',
          '300',
          '30-39',
          'Female',
          'Sample book',
          '1',
          '0',
          '1',
          '0',
          'line one line two',
        ],
      ]);
    });

    it('should use the localized labels of the selected locale', () => {
      const [row] = transactionRows(sale, lookup, events, EXPORT_LABELS.ja);

      expect(row.slice(6, 9)).toEqual(['30〜39歳', '女性', '見本誌']);
    });

    it('should leave the event column empty when the event is unknown', () => {
      const [row] = transactionRows({ ...sale, eventId: 'e9' }, lookup, events, EXPORT_LABELS.en);

      expect(row[0]).toBe('');
    });
  });

  describe('formatRow and parseCsvLine', () => {
    it('should quote every field and end with a single newline', () => {
      expect(formatRow(['a', 'b,c', ''])).toBe('"a","b,c",""\n');
    });

    it('should read back the original field values of an exported row', () => {
      const [fields] = transactionRows(sale, lookup, events, EXPORT_LABELS.en);

      expect(parseCsvLine(formatRow(fields))).toEqual(fields);
    });

    it('should parse the unquoted header', () => {
      expect(parseCsvLine(formatHeader(EXPORT_LABELS.en))).toEqual(EXPORT_LABELS.en.header);
    });
  });
});
