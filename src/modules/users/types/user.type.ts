export interface User {
  id: number;
  email: string;
  passwordHash: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateUserInput {
  email: string;
  passwordHash: string;
}

export interface UserResponse {
  id: number;
  email: string;
  created_at: string;
  updated_at: string;
}
