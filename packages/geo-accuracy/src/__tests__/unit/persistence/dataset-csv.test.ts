/**
 * Dataset CSV Codec Tests
 */

import { describe, it, expect } from 'vitest';
import { parseDataset, serializeDataset } from '../../../persistence/dataset-csv.js';
import { DatasetFormatError } from '../../../core/errors.js';
import { makeRow } from '../../setup.js';

const RAW_EXPORT = [
  '1,Springfield,,US,39.7817,-89.6501,IL',
  '2,Montreal,Montréal,CA,45.5017,-73.5673,QC',
  '3,"Washington, D.C.",,US,38.9072,-77.0369,DC',
].join('\n');

const CHECKPOINT = [
  'id,city,city_alt,country,latitude,longitude,state,geo_accuracy',
  '1,Springfield,,US,39.7817,-89.6501,IL,accurate',
  '2,Lyon,,FR,45.764,4.8357,,timeout',
  '3,Paris,,FR,48.8566,2.3522,,',
].join('\n');

describe('parseDataset', () => {
  it('should read a raw export without header as unchecked rows', () => {
    const rows = parseDataset(RAW_EXPORT);

    expect(rows).toHaveLength(3);
    expect(rows[0]).toEqual({
      record: {
        id: '1',
        claimedCity: 'Springfield',
        claimedCityAlt: undefined,
        claimedCountry: 'US',
        latitude: 39.7817,
        longitude: -89.6501,
        claimedStateOrProvince: 'IL',
      },
      status: 'unchecked',
    });
    expect(rows[1].record.claimedCityAlt).toBe('Montréal');
    expect(rows[2].record.claimedCity).toBe('Washington, D.C.');
  });

  it('should read a checkpoint with header and status column', () => {
    const rows = parseDataset(CHECKPOINT);

    expect(rows.map((row) => row.status)).toEqual(['accurate', 'timeout', 'unchecked']);
    expect(rows[1].record.claimedStateOrProvince).toBeUndefined();
  });

  it('should reset unrecognized statuses to unchecked', () => {
    const rows = parseDataset('1,Springfield,,US,39.7817,-89.6501,IL,maybe');
    expect(rows[0].status).toBe('unchecked');
  });

  it('should read blank coordinates as NaN', () => {
    const rows = parseDataset('1,Springfield,,US,,-89.6501,IL');
    expect(rows[0].record.latitude).toBeNaN();
  });

  it('should accept rows without the state column', () => {
    const rows = parseDataset('1,Paris,,FR,48.8566,2.3522');
    expect(rows[0].record.claimedStateOrProvince).toBeUndefined();
  });

  it('should skip empty lines', () => {
    expect(parseDataset(`${RAW_EXPORT}\n\n`)).toHaveLength(3);
    expect(parseDataset('')).toEqual([]);
  });

  it('should reject rows with too few columns, naming the line', () => {
    const content = 'id,city,city_alt,country,latitude,longitude,state\n1,Springfield,,US,39.78';

    expect(() => parseDataset(content, 'input.csv')).toThrow(DatasetFormatError);
    try {
      parseDataset(content, 'input.csv');
    } catch (error) {
      expect(error).toMatchObject({ filePath: 'input.csv', line: 2 });
    }
  });

  it('should reject malformed CSV', () => {
    expect(() => parseDataset('1,"Springfield,US,39.78,-89.65')).toThrow(DatasetFormatError);
  });
});

describe('serializeDataset', () => {
  it('should write a header, every column and the status', () => {
    const csv = serializeDataset([
      makeRow({ id: '1' }, 'accurate'),
      makeRow({ id: '2', claimedCity: 'Washington, D.C.', claimedStateOrProvince: undefined }),
    ]);

    expect(csv).toBe(
      [
        'id,city,city_alt,country,latitude,longitude,state,geo_accuracy',
        '1,Springfield,,US,39.7817,-89.6501,IL,accurate',
        '2,"Washington, D.C.",,US,39.7817,-89.6501,,unchecked',
        '',
      ].join('\n')
    );
  });

  it('should write non-finite coordinates as empty cells', () => {
    const csv = serializeDataset([makeRow({ id: '1', latitude: Number.NaN })]);
    expect(csv.split('\n')[1]).toBe('1,Springfield,,US,,-89.6501,IL,unchecked');
  });

  it('should be read back by parseDataset', () => {
    const rows = [
      makeRow({ id: '1', claimedCityAlt: 'Springfield City' }, 'state_only_match'),
      makeRow({ id: '2' }),
    ];

    expect(parseDataset(serializeDataset(rows))).toEqual(rows);
  });
});
