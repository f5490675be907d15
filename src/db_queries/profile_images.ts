import { createClient } from '@supabase/supabase-js';
import autoBind from 'auto-bind';
import dotenv from 'dotenv';
import { v4 as uuidv4 } from 'uuid';
import { constants } from '../utils/constants';
import { helpers } from '../utils/helpers';
import ProfileImage from '../models/profile_image.model';

dotenv.config();

export interface ProfileImageStorage {
  uploadProfileImage(userId: string, image: ProfileImage): Promise<string>;
}

export class ProfileImages implements ProfileImageStorage {
  private bucket: string;

  constructor() {
    this.bucket = helpers.getEnv('PROFILE_IMAGES_BUCKET', constants.PROFILE_IMAGES_BUCKET);
    autoBind(this);
  }

  getProfileImageKey(userId: string, mimetype: string): string {
    const fileExtension = mimetype.split('/').pop();
    return `${userId}_${uuidv4()}.${fileExtension}`;
  }

  async uploadProfileImage(userId: string, image: ProfileImage): Promise<string> {
    const supabase = createClient(helpers.getEnv('SUPABASE_URL'), helpers.getEnv('SUPABASE_SERVICE_KEY'));
    const fileName = this.getProfileImageKey(userId, image.mimetype);
    const { error } = await supabase.storage
      .from(this.bucket)
      .upload(fileName, image.buffer, {
        contentType: image.mimetype,
        upsert: false
      });
    if (error) {
      throw error;
    }
    const { data } = supabase.storage.from(this.bucket).getPublicUrl(fileName);
    return data.publicUrl;
  }
}
