/**
 * Unit tests for MongoBlobStore
 */

const mockLean = jest.fn();
const mockFindOne = jest.fn().mockReturnValue({ lean: mockLean });
const mockUpdateOne = jest.fn().mockResolvedValue({ acknowledged: true });

jest.mock('../../../src/models/BlobRecord', () => ({
  BlobRecord: {
    findOne: mockFindOne,
    updateOne: mockUpdateOne,
  },
}));

jest.mock('../../../src/config/database', () => ({
  connectDatabase: jest.fn().mockResolvedValue(undefined),
  disconnectDatabase: jest.fn().mockResolvedValue(undefined),
  getDatabaseStatus: jest.fn().mockReturnValue({ connected: false, readyState: 0 }),
}));

import { MongoBlobStore } from '../../../src/storage/mongoBlobStore';

describe('MongoBlobStore', () => {
  const store = new MongoBlobStore();

  it('should read the value of the matching document', async () => {
    mockLean.mockResolvedValueOnce({ key: 'events.json', value: '{"events":[]}' });

    await expect(store.get('events.json')).resolves.toBe('{"events":[]}');
    expect(mockFindOne).toHaveBeenCalledWith({ key: 'events.json' });
  });

  it('should resolve null when no document exists', async () => {
    mockLean.mockResolvedValueOnce(null);

    await expect(store.get('events.json')).resolves.toBeNull();
  });

  it('should upsert whole values', async () => {
    await store.put('products.json', '{}');

    expect(mockUpdateOne).toHaveBeenCalledWith(
      { key: 'products.json' },
      { $set: { value: '{}' } },
      { upsert: true }
    );
  });

  it('should concatenate appended text on the server', async () => {
    await store.append('sales.csv', 'row\n');

    expect(mockUpdateOne).toHaveBeenLastCalledWith(
      { key: 'sales.csv' },
      [{ $set: { value: { $concat: [{ $ifNull: ['$value', ''] }, 'row\n'] } } }],
      { upsert: true }
    );
  });

  it('should not be ready before the database connects', () => {
    expect(store.isReady()).toBe(false);
  });
});
