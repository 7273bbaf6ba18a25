import mongoose from 'mongoose';
import Feedback from '../../models/Feedback';
import Counter from '../../models/Counter';
import {
  InMemoryFeedbackStore,
  MongoFeedbackStore,
} from '../../services/feedbackStore.service';
import { StoreError } from '../../utils/errors';
import { makeNewFeedback } from '../helpers/records';

/** A clock that moves one minute forward on every read. */
function steppingClock(start = '2026-03-01T10:00:00.000Z') {
  let current = new Date(start).getTime();
  return () => {
    const now = new Date(current);
    current += 60_000;
    return now;
  };
}

describe('InMemoryFeedbackStore', () => {
  it('returns an empty list when nothing was stored', async () => {
    const store = new InMemoryFeedbackStore();
    await store.initialize();

    await expect(store.listAll()).resolves.toEqual([]);
    await expect(store.listByRatingRange(1, 5)).resolves.toEqual([]);
  });

  it('assigns an id and creation time on insert', async () => {
    const store = new InMemoryFeedbackStore();
    const startedAt = Date.now();
    const input = makeNewFeedback({ email: 'someone@example.com' });

    const id = await store.insert(input);
    const all = await store.listAll();

    expect(all).toHaveLength(1);
    const [record] = all;
    expect(record).toEqual({ ...input, id, createdAt: expect.any(Date) });
    expect(record.createdAt.getTime()).toBeGreaterThanOrEqual(startedAt);
  });

  it('hands out increasing ids', async () => {
    const store = new InMemoryFeedbackStore();
    const first = await store.insert(makeNewFeedback());
    const second = await store.insert(makeNewFeedback());
    const third = await store.insert(makeNewFeedback());

    expect([first, second, third]).toEqual([1, 2, 3]);
  });

  it('lists newest first', async () => {
    const store = new InMemoryFeedbackStore(steppingClock());
    await store.insert(makeNewFeedback({ message: 'first message here' }));
    await store.insert(makeNewFeedback({ message: 'second message here' }));
    await store.insert(makeNewFeedback({ message: 'third message here' }));

    const all = await store.listAll();

    expect(all.map((record) => record.message)).toEqual([
      'third message here',
      'second message here',
      'first message here',
    ]);
  });

  it('breaks creation-time ties by the higher id', async () => {
    const fixed = new Date('2026-03-01T10:00:00.000Z');
    const store = new InMemoryFeedbackStore(() => fixed);
    await store.insert(makeNewFeedback());
    await store.insert(makeNewFeedback());

    const all = await store.listAll();

    expect(all.map((record) => record.id)).toEqual([2, 1]);
  });

  it('filters by an inclusive rating range', async () => {
    const store = new InMemoryFeedbackStore(steppingClock());
    for (const rating of [1, 2, 3, 4, 5]) {
      await store.insert(makeNewFeedback({ rating }));
    }

    const records = await store.listByRatingRange(2, 4);

    expect(records.map((record) => record.rating)).toEqual([4, 3, 2]);
  });

  it('filters by category and by sentiment', async () => {
    const store = new InMemoryFeedbackStore(steppingClock());
    await store.insert(makeNewFeedback({ category: 'Bug Report', sentiment: 'negative' }));
    await store.insert(makeNewFeedback({ category: 'Performance', sentiment: 'positive' }));
    await store.insert(makeNewFeedback({ category: 'Bug Report', sentiment: 'neutral' }));

    const bugs = await store.listByCategory('Bug Report');
    const positive = await store.listBySentiment('positive');

    expect(bugs.map((record) => record.id)).toEqual([3, 1]);
    expect(positive.map((record) => record.category)).toEqual(['Performance']);
  });

  it('returns copies so callers cannot mutate stored records', async () => {
    const store = new InMemoryFeedbackStore();
    const id = await store.insert(makeNewFeedback({ rating: 2 }));

    const [record] = await store.listAll();
    record.rating = 5;

    await expect(store.findById(id)).resolves.toMatchObject({ rating: 2 });
    await expect(store.findById(99)).resolves.toBeNull();
  });
});

describe('MongoFeedbackStore', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns an empty list when the read fails', async () => {
    jest.spyOn(Feedback, 'find').mockImplementation(() => {
      throw new Error('connection lost');
    });
    const store = new MongoFeedbackStore();

    await expect(store.listAll()).resolves.toEqual([]);
    await expect(store.listByCategory('Bug Report')).resolves.toEqual([]);
    await expect(store.findById(1)).resolves.toBeNull();
  });

  it('propagates a failed write as StoreError', async () => {
    jest.spyOn(Counter, 'findOneAndUpdate').mockImplementation(() => {
      throw new Error('not primary');
    });
    const store = new MongoFeedbackStore();

    await expect(store.insert(makeNewFeedback())).rejects.toBeInstanceOf(StoreError);
  });

  it('takes the new id from the counter sequence', async () => {
    jest.spyOn(mongoose.Query.prototype, 'exec').mockResolvedValue({ _id: 'feedback', seq: 42 });
    const update = jest.spyOn(Counter, 'findOneAndUpdate');
    const create = jest.spyOn(Feedback, 'create').mockResolvedValue([]);
    const input = makeNewFeedback({ category: 'Performance' });

    const id = await new MongoFeedbackStore().insert(input);

    expect(id).toBe(42);
    expect(update).toHaveBeenCalledWith(
      { _id: 'feedback' },
      { $inc: { seq: 1 } },
      { new: true, upsert: true }
    );
    expect(create).toHaveBeenCalledWith({ ...input, feedbackId: 42, createdAt: expect.any(Date) });
  });

  it('maps stored documents to records and sorts newest first', async () => {
    const createdAt = new Date('2026-03-02T09:30:00.000Z');
    jest.spyOn(mongoose.Query.prototype, 'exec').mockResolvedValue([
      {
        feedbackId: 7,
        userName: 'Ana',
        email: null,
        category: 'Bug Report',
        rating: 3,
        message: 'Export button does nothing on Safari.',
        sentiment: 'negative',
        summary: 'Safari export broken.',
        aiResponse: 'Sorry about that.',
        recommendations: null,
        createdAt,
      },
    ]);
    const find = jest.spyOn(Feedback, 'find');
    const sort = jest.spyOn(mongoose.Query.prototype, 'sort');

    const records = await new MongoFeedbackStore().listByRatingRange(2, 4);

    expect(find).toHaveBeenCalledWith({ rating: { $gte: 2, $lte: 4 } });
    expect(sort).toHaveBeenCalledWith({ createdAt: -1, feedbackId: -1 });
    expect(records).toHaveLength(1);
    expect(records[0]).toStrictEqual({
      id: 7,
      userName: 'Ana',
      category: 'Bug Report',
      rating: 3,
      message: 'Export button does nothing on Safari.',
      sentiment: 'negative',
      summary: 'Safari export broken.',
      aiResponse: 'Sorry about that.',
      createdAt,
    });
  });

  it('looks a record up by its numeric id', async () => {
    jest.spyOn(mongoose.Query.prototype, 'exec').mockResolvedValue([]);
    const find = jest.spyOn(Feedback, 'find');

    await expect(new MongoFeedbackStore().findById(5)).resolves.toBeNull();
    expect(find).toHaveBeenCalledWith({ feedbackId: 5 });
  });
});

describe('Feedback model', () => {
  it('rejects ratings outside 1-5', () => {
    const doc = new Feedback({ ...makeNewFeedback({ rating: 7 }), feedbackId: 1 });

    const error = doc.validateSync();

    expect(error?.errors.rating).toBeDefined();
  });

  it('defaults sentiment to neutral and stamps createdAt', () => {
    const { sentiment: _omitted, ...rest } = makeNewFeedback();
    const doc = new Feedback({ ...rest, feedbackId: 2 });

    expect(doc.validateSync()).toBeFalsy();
    expect(doc.sentiment).toBe('neutral');
    expect(doc.createdAt).toBeInstanceOf(Date);
  });
});
