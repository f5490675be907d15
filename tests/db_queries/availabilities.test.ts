import { Availabilities } from '../../src/db_queries/availabilities';
import { NotFoundError, ValidationError } from '../../src/utils/errors';
import { FakeDBClient } from '../utils/fake_db_client';
import { MENTOR_ID } from '../utils/test_data';

const SLOT_ID = 'e6f7a8b9-c0d1-4e2f-9a3b-4c5d6e7f8a9b';
const OTHER_SLOT_ID = 'f7a8b9c0-d1e2-4f3a-8b4c-5d6e7f8a9b0c';
const availabilities = new Availabilities();
let client: FakeDBClient;

beforeEach(() => {
  client = new FakeDBClient().on(/SELECT \* FROM availability/, [
    {
      availabilityid: SLOT_ID,
      mentorid: MENTOR_ID,
      start: new Date('2024-05-01T09:00:00Z'),
      end: new Date('2024-05-01T10:00:00Z')
    }
  ]);
});

describe('Add availability functionality', () => {
  test('addAvailabilityFromDB stores the slot and returns the refreshed list', async () => {
    const slots = await availabilities.addAvailabilityFromDB(MENTOR_ID, '2024-05-01T09:00:00Z', '2024-05-01T10:00:00Z', client);

    const inserts = client.findQueries(/INSERT INTO availability/);
    expect(inserts.length).toEqual(1);
    expect(inserts[0].values).toEqual([MENTOR_ID, '2024-05-01T09:00:00.000Z', '2024-05-01T10:00:00.000Z']);
    expect(slots.length).toEqual(1);
    expect(slots[0].id).toEqual(SLOT_ID);
    expect(slots[0].startFormatted).toEqual('Wed, May 1 2024 10:00 AM WAT');
    expect(slots[0].endFormatted).toEqual('Wed, May 1 2024 11:00 AM WAT');
  });

  test('addAvailabilityFromDB rejects a slot that ends before it starts without writing', async () => {
    await expect(availabilities.addAvailabilityFromDB(MENTOR_ID, '2024-05-01T10:00:00Z', '2024-05-01T09:00:00Z', client))
      .rejects.toThrow(new ValidationError('End time must be after start time.'));
    expect(client.queries.length).toEqual(0);
  });

  test('addAvailabilityFromDB rejects an empty slot', async () => {
    await expect(availabilities.addAvailabilityFromDB(MENTOR_ID, '2024-05-01T10:00:00Z', '2024-05-01T10:00:00Z', client))
      .rejects.toBeInstanceOf(ValidationError);
    expect(client.findQueries(/INSERT/).length).toEqual(0);
  });

  test('addAvailabilityFromDB rejects times it cannot parse', async () => {
    await expect(availabilities.addAvailabilityFromDB(MENTOR_ID, 'next monday', '2024-05-01T10:00:00Z', client))
      .rejects.toThrow('Please provide valid start and end times.');
    expect(client.queries.length).toEqual(0);
  });
});

describe('Delete availability functionality', () => {
  test('deleteAvailabilityFromDB scopes the delete to the owning mentor', async () => {
    client.on(/DELETE FROM availability/, [{}]);

    const slots = await availabilities.deleteAvailabilityFromDB(MENTOR_ID, OTHER_SLOT_ID, client);

    expect(client.findQueries(/DELETE FROM availability/)[0].values).toEqual([OTHER_SLOT_ID, MENTOR_ID]);
    expect(slots.map(slot => slot.id)).toEqual([SLOT_ID]);
  });

  test('deleteAvailabilityFromDB reports a slot that does not belong to the mentor', async () => {
    await expect(availabilities.deleteAvailabilityFromDB(MENTOR_ID, OTHER_SLOT_ID, client))
      .rejects.toBeInstanceOf(NotFoundError);
  });

  test('deleteAvailabilityFromDB validates the slot id before querying', async () => {
    await expect(availabilities.deleteAvailabilityFromDB(MENTOR_ID, 'slot-9', client))
      .rejects.toThrow(new ValidationError('Invalid availability id'));
    expect(client.queries.length).toEqual(0);
  });
});

describe('Get availability functionality', () => {
  test('getAvailabilitiesFromDB validates the mentor id before querying', async () => {
    await expect(availabilities.getAvailabilitiesFromDB('not-a-mentor', client))
      .rejects.toThrow(new ValidationError('Invalid mentor id'));
    expect(client.queries.length).toEqual(0);
  });
});
