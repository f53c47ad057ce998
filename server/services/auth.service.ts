import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { getDb } from '../database/connection';
import { env } from '../config/env';
import type { UserRow } from '../database/rows';
import type { ActorContext, User } from '../../shared/types';
import { mapUser } from './mappers';
import { ConflictError, NotFoundError, UnauthorizedError } from '../utils/errors';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('auth');

export interface RegisterInput {
  username: string;
  password: string;
  full_name?: string;
  email?: string;
}

export interface LoginInput {
  username: string;
  password: string;
}

const jwtPayloadSchema = z.object({
  userId: z.number().int().positive(),
  username: z.string(),
});

export type JwtPayload = z.infer<typeof jwtPayloadSchema>;

export class AuthService {
  async register(input: RegisterInput): Promise<User> {
    const db = getDb();

    const existing: UserRow | undefined = await db('users').where({ username: input.username }).first();
    if (existing) throw new ConflictError(`Username "${input.username}" is already taken`);

    const passwordHash = await bcrypt.hash(input.password, 12);
    const [user]: UserRow[] = await db('users')
      .insert({
        username: input.username,
        full_name: input.full_name ?? null,
        email: input.email ?? null,
        password_hash: passwordHash,
        is_active: true,
        created_at: new Date(),
      })
      .returning('*');

    log.info({ userId: user.id, username: user.username }, 'User registered');
    return mapUser(user);
  }

  async login(input: LoginInput): Promise<{ token: string; user: User }> {
    const db = getDb();

    const user: UserRow | undefined = await db('users')
      .where({ username: input.username, is_active: true })
      .first();

    if (!user) throw new UnauthorizedError('Invalid username or password');

    const isValid = await bcrypt.compare(input.password, user.password_hash);
    if (!isValid) throw new UnauthorizedError('Invalid username or password');

    const payload: JwtPayload = { userId: user.id, username: user.username };
    const token = jwt.sign(payload, env.JWT_SECRET, { expiresIn: env.JWT_EXPIRES_IN });

    const now = new Date();
    await db('users').where({ id: user.id }).update({ last_login_at: now });

    return { token, user: mapUser({ ...user, last_login_at: now }) };
  }

  verifyToken(token: string): JwtPayload {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, env.JWT_SECRET);
    } catch {
      throw new UnauthorizedError('Invalid or expired token');
    }
    const parsed = jwtPayloadSchema.safeParse(decoded);
    if (!parsed.success) throw new UnauthorizedError('Invalid or expired token');
    return parsed.data;
  }

  async getUser(userId: number): Promise<User> {
    const row: UserRow | undefined = await getDb()('users').where({ id: userId }).first();
    if (!row) throw new NotFoundError('User not found', 'user', userId);
    return mapUser(row);
  }

  toActor(payload: JwtPayload): ActorContext {
    return { userId: payload.userId, username: payload.username };
  }
}

export const authService = new AuthService();
