import { Request, Response } from 'express';
import autoBind from 'auto-bind';
import * as yup from 'yup';
import { Conn, DBQueryClient } from '../db/conn';
import { constants } from '../utils/constants';
import { helpers } from '../utils/helpers';
import { ProfileImages, ProfileImageStorage } from './profile_images';
import Profile from '../models/profile.model';
import ProfileImage from '../models/profile_image.model';

const conn = new Conn();
const pool = conn.pool;

export interface ProfileUpdateResult {
  profile: Profile;
  imageError?: string;
}

export class Profiles {
  private profileImages: ProfileImageStorage;

  constructor(profileImages: ProfileImageStorage = new ProfileImages()) {
    this.profileImages = profileImages;
    autoBind(this);
  }

  updateProfileValidationSchema = {
    bodySchema: yup.object({
      name: yup.string().trim().required('Name is required'),
      bio: yup.string().default(''),
      skills: yup.string().default(''),
      goals: yup.string().default('')
    })
  };

  async getProfile(request: Request, response: Response): Promise<void> {
    try {
      const profile = await this.getProfileFromDB(helpers.getRequestUser(request).id, pool);
      response.status(200).json(profile);
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async getProfileFromDB(userId: string, client: DBQueryClient): Promise<Profile> {
    const getProfileQuery = 'SELECT * FROM profile WHERE userid = $1';
    const { rows } = await client.query(getProfileQuery, [userId]);
    if (!rows[0]) {
      return { userId: userId };
    }
    return {
      userId: rows[0].userid,
      name: rows[0].name,
      bio: rows[0].bio,
      skills: rows[0].skills,
      goals: rows[0].goals,
      profileImageUrl: rows[0].profile_image_url
    };
  }

  async updateProfile(request: Request, response: Response): Promise<void> {
    const client = await pool.connect();
    try {
      const userId = helpers.getRequestUser(request).id;
      const { name, bio, skills, goals } = this.updateProfileValidationSchema.bodySchema.validateSync(request.body);
      let image: ProfileImage | undefined;
      if (request.file) {
        image = {
          buffer: request.file.buffer,
          mimetype: request.file.mimetype
        };
      }
      await client.query('BEGIN');
      const result = await this.updateProfileFromDB(userId, { name, bio, skills, goals }, image, client);
      await client.query('COMMIT');
      response.status(200).json(result);
    } catch (error) {
      await client.query('ROLLBACK');
      helpers.sendError(response, error);
    } finally {
      client.release();
    }
  }

  /**
   * Upserts the owner's profile. A rejected or failed image upload is reported back in `imageError` and the
   * other fields are still saved.
   */
  async updateProfileFromDB(userId: string, profile: Profile, image: ProfileImage | undefined, client: DBQueryClient): Promise<ProfileUpdateResult> {
    let profileImageUrl: string | null = null;
    let imageError: string | undefined;
    if (image && !constants.PROFILE_IMAGE_TYPES.includes(image.mimetype)) {
      imageError = 'Profile picture must be a JPG or PNG image';
    } else if (image) {
      try {
        profileImageUrl = await this.profileImages.uploadProfileImage(userId, image);
      } catch (error) {
        console.error('[profile] Profile image upload failed', error);
        imageError = `Profile image upload failed: ${error instanceof Error ? error.message : String(error)}`;
      }
    }
    const upsertProfileQuery = `INSERT INTO profile (userid, name, bio, skills, goals, profile_image_url)
      VALUES ($1, $2, $3, $4, $5, $6)
      ON CONFLICT (userid) DO UPDATE SET
        name = EXCLUDED.name,
        bio = EXCLUDED.bio,
        skills = EXCLUDED.skills,
        goals = EXCLUDED.goals,
        profile_image_url = COALESCE(EXCLUDED.profile_image_url, profile.profile_image_url)
      RETURNING *`;
    const values = [userId, profile.name, profile.bio, profile.skills, profile.goals, profileImageUrl];
    const { rows } = await client.query(upsertProfileQuery, values);
    const updateUserQuery = 'UPDATE users SET profile_completed = true WHERE userid = $1';
    await client.query(updateUserQuery, [userId]);
    const result: ProfileUpdateResult = {
      profile: {
        userId: rows[0].userid,
        name: rows[0].name,
        bio: rows[0].bio,
        skills: rows[0].skills,
        goals: rows[0].goals,
        profileImageUrl: rows[0].profile_image_url
      }
    };
    if (imageError) {
      result.imageError = imageError;
    }
    return result;
  }
}
