import { Request, Response } from 'express';
import autoBind from 'auto-bind';
import moment from 'moment';
import pg from 'pg';
import * as yup from 'yup';
import { validate as uuidValidate } from 'uuid';
import { Conn, DBQueryClient } from '../db/conn';
import { constants } from '../utils/constants';
import { helpers } from '../utils/helpers';
import { formatDateTimeSafe, parseDateTimeSafe } from '../utils/datetime';
import { NotFoundError, ValidationError } from '../utils/errors';
import Availability from '../models/availability.model';

const conn: Conn = new Conn();
const pool = conn.pool;

export class Availabilities {
  constructor() {
    autoBind(this);
  }

  addAvailabilityValidationSchema = {
    bodySchema: yup.object({
      start: yup.string().required('Start time is required'),
      end: yup.string().required('End time is required')
    })
  };

  async getAvailabilities(request: Request, response: Response): Promise<void> {
    try {
      const mentorId = request.params.mentor_id || helpers.getRequestUser(request).id;
      const availabilities = await this.getAvailabilitiesFromDB(mentorId, pool);
      response.status(200).json(availabilities);
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async getAvailabilitiesFromDB(mentorId: string, client: DBQueryClient): Promise<Array<Availability>> {
    if (!uuidValidate(mentorId)) {
      throw new ValidationError('Invalid mentor id');
    }
    const getAvailabilitiesQuery = `SELECT * FROM availability
      WHERE mentorid = $1
      ORDER BY start ASC`;
    const { rows } = await client.query(getAvailabilitiesQuery, [mentorId]);
    return rows.map(row => this.mapAvailabilityRow(row));
  }

  mapAvailabilityRow(row: pg.QueryResultRow): Availability {
    return {
      id: row.availabilityid,
      mentorId: row.mentorid,
      start: moment.utc(row.start).format(constants.DATE_TIME_FORMAT),
      end: moment.utc(row.end).format(constants.DATE_TIME_FORMAT),
      startFormatted: formatDateTimeSafe(row.start),
      endFormatted: formatDateTimeSafe(row.end)
    };
  }

  async addAvailability(request: Request, response: Response): Promise<void> {
    try {
      const mentorId = helpers.getRequestUser(request).id;
      const { start, end } = this.addAvailabilityValidationSchema.bodySchema.validateSync(request.body);
      const availabilities = await this.addAvailabilityFromDB(mentorId, start, end, pool);
      response.status(200).json(availabilities);
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  /**
   * Declines slots whose end is not strictly after their start. Returns the mentor's refreshed slots.
   */
  async addAvailabilityFromDB(mentorId: string, start: unknown, end: unknown, client: DBQueryClient): Promise<Array<Availability>> {
    const startDateTime = parseDateTimeSafe(start);
    const endDateTime = parseDateTimeSafe(end);
    if (!startDateTime || !endDateTime) {
      throw new ValidationError('Please provide valid start and end times.');
    }
    if (!endDateTime.isAfter(startDateTime)) {
      throw new ValidationError('End time must be after start time.');
    }
    const insertAvailabilityQuery = `INSERT INTO availability (mentorid, start, "end")
      VALUES ($1, $2, $3)`;
    await client.query(insertAvailabilityQuery, [mentorId, startDateTime.toISOString(), endDateTime.toISOString()]);
    return this.getAvailabilitiesFromDB(mentorId, client);
  }

  async deleteAvailability(request: Request, response: Response): Promise<void> {
    const availabilityId = request.params.id;
    try {
      const mentorId = helpers.getRequestUser(request).id;
      const availabilities = await this.deleteAvailabilityFromDB(mentorId, availabilityId, pool);
      response.status(200).json(availabilities);
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async deleteAvailabilityFromDB(mentorId: string, availabilityId: string, client: DBQueryClient): Promise<Array<Availability>> {
    if (!uuidValidate(availabilityId)) {
      throw new ValidationError('Invalid availability id');
    }
    const deleteAvailabilityQuery = 'DELETE FROM availability WHERE availabilityid = $1 AND mentorid = $2';
    const { rowCount } = await client.query(deleteAvailabilityQuery, [availabilityId, mentorId]);
    if (!rowCount) {
      throw new NotFoundError('Availability slot not found');
    }
    return this.getAvailabilitiesFromDB(mentorId, client);
  }
}
