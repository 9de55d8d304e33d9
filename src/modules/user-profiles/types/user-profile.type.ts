export interface UserProfile {
  id: number;
  userId: number;
  name: string;
  username: string;
  iconPath: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateUserProfileInput {
  userId: number;
  name: string;
  username: string;
  iconPath: string | null;
}

/** A profile without an icon serializes `icon_path` as "". */
export interface UserProfileResponse {
  id: number;
  name: string;
  username: string;
  icon_path: string;
}

export interface CreateUserProfileResponse {
  message: string;
  user_profile: UserProfileResponse;
}

export interface UsernameAvailabilityResponse {
  available: boolean;
}
