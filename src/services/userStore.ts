// src/services/userStore.ts
import { randomUUID } from "crypto";
import { ObjectId, type Collection, type Db } from "mongodb";

export type UserRole = "user" | "trader" | "admin";
export const USER_ROLES: readonly UserRole[] = ["user", "trader", "admin"];

export interface UserRecord {
  id: string;
  name: string;
  email: string;
  passwordHash: string;
  role: UserRole;
  emailVerified: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/** What a one-time code unlocks. */
export type CodePurpose = "verify_email" | "reset_password";

export interface OneTimeCodeRecord {
  id: string;
  userId: string;
  purpose: CodePurpose;
  codeHash: string;
  attempts: number;
  used: boolean;
  createdAt: Date;
  expiresAt: Date;
}

export interface SessionRecord {
  id: string;
  userId: string;
  createdAt: Date;
  expiresAt: Date;
}

export type NewUser = Omit<UserRecord, "id">;
export type NewOneTimeCode = Omit<OneTimeCodeRecord, "id">;
export type NewSession = Omit<SessionRecord, "id">;

export interface UserStore {
  findByEmail(email: string): Promise<UserRecord | null>;
  findById(id: string): Promise<UserRecord | null>;
  create(user: NewUser): Promise<UserRecord>;
  updatePassword(id: string, passwordHash: string): Promise<void>;
  markEmailVerified(id: string): Promise<void>;
  setRole(email: string, role: UserRole): Promise<boolean>;

  createCode(code: NewOneTimeCode): Promise<OneTimeCodeRecord>;
  /** marks every open code of that purpose for the user as used */
  invalidateCodes(userId: string, purpose: CodePurpose): Promise<void>;
  findCode(id: string): Promise<OneTimeCodeRecord | null>;
  /** newest unused code of that purpose */
  findOpenCode(userId: string, purpose: CodePurpose): Promise<OneTimeCodeRecord | null>;
  recordFailedAttempt(id: string): Promise<void>;
  markCodeUsed(id: string): Promise<void>;

  createSession(session: NewSession): Promise<SessionRecord>;
  findSession(id: string): Promise<SessionRecord | null>;
  /** false when there was no such session */
  deleteSession(id: string): Promise<boolean>;
  /** number of sessions removed */
  deleteExpiredSessions(now: Date): Promise<number>;
}

/* =========================
   Mongo
========================= */
type UserDoc = Omit<NewUser, "emailVerified"> & { _id?: ObjectId; emailVerified?: boolean };
type CodeDoc = Omit<NewOneTimeCode, "userId"> & { _id?: ObjectId; userId: ObjectId };
type SessionDoc = Omit<NewSession, "userId"> & { _id?: ObjectId; userId: ObjectId };

const toObjectId = (id: string): ObjectId | null => (ObjectId.isValid(id) ? new ObjectId(id) : null);

function requireObjectId(id: string): ObjectId {
  const _id = toObjectId(id);
  if (!_id) throw new Error(`[user.store] invalid user id ${id}`);
  return _id;
}

export class MongoUserStore implements UserStore {
  private readonly users: Collection<UserDoc>;
  private readonly codes: Collection<CodeDoc>;
  private readonly sessions: Collection<SessionDoc>;

  constructor(db: Db) {
    this.users = db.collection<UserDoc>("users");
    this.codes = db.collection<CodeDoc>("verification_codes");
    this.sessions = db.collection<SessionDoc>("sessions");
  }

  async ensureIndexes(): Promise<void> {
    await this.users.createIndex({ email: 1 }, { unique: true });
    await this.codes.createIndex({ userId: 1, purpose: 1, used: 1 });
    await this.codes.createIndex({ expiresAt: 1 });
    await this.sessions.createIndex({ expiresAt: 1 });
  }

  private static toUser(doc: UserDoc & { _id: ObjectId }): UserRecord {
    return {
      id: doc._id.toString(),
      name: doc.name,
      email: doc.email,
      passwordHash: doc.passwordHash,
      role: doc.role,
      // accounts created before verification existed count as verified
      emailVerified: doc.emailVerified ?? true,
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    };
  }

  private static toCode(doc: CodeDoc & { _id: ObjectId }): OneTimeCodeRecord {
    return {
      id: doc._id.toString(),
      userId: doc.userId.toString(),
      purpose: doc.purpose,
      codeHash: doc.codeHash,
      attempts: doc.attempts,
      used: doc.used,
      createdAt: doc.createdAt,
      expiresAt: doc.expiresAt,
    };
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const doc = await this.users.findOne({ email });
    return doc ? MongoUserStore.toUser(doc) : null;
  }

  async findById(id: string): Promise<UserRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await this.users.findOne({ _id });
    return doc ? MongoUserStore.toUser(doc) : null;
  }

  async create(user: NewUser): Promise<UserRecord> {
    const res = await this.users.insertOne({ ...user });
    return { ...user, id: res.insertedId.toString() };
  }

  async updatePassword(id: string, passwordHash: string): Promise<void> {
    const _id = toObjectId(id);
    if (!_id) return;
    await this.users.updateOne({ _id }, { $set: { passwordHash, updatedAt: new Date() } });
  }

  async markEmailVerified(id: string): Promise<void> {
    const _id = toObjectId(id);
    if (!_id) return;
    await this.users.updateOne({ _id }, { $set: { emailVerified: true, updatedAt: new Date() } });
  }

  async setRole(email: string, role: UserRole): Promise<boolean> {
    const r = await this.users.updateOne({ email }, { $set: { role, updatedAt: new Date() } });
    return r.matchedCount > 0;
  }

  async createCode(code: NewOneTimeCode): Promise<OneTimeCodeRecord> {
    const res = await this.codes.insertOne({ ...code, userId: requireObjectId(code.userId) });
    return { ...code, id: res.insertedId.toString() };
  }

  async invalidateCodes(userId: string, purpose: CodePurpose): Promise<void> {
    const _userId = toObjectId(userId);
    if (!_userId) return;
    await this.codes.updateMany({ userId: _userId, purpose, used: false }, { $set: { used: true } });
  }

  async findCode(id: string): Promise<OneTimeCodeRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await this.codes.findOne({ _id });
    return doc ? MongoUserStore.toCode(doc) : null;
  }

  async findOpenCode(userId: string, purpose: CodePurpose): Promise<OneTimeCodeRecord | null> {
    const _userId = toObjectId(userId);
    if (!_userId) return null;
    const doc = await this.codes.findOne({ userId: _userId, purpose, used: false }, { sort: { createdAt: -1 } });
    return doc ? MongoUserStore.toCode(doc) : null;
  }

  async recordFailedAttempt(id: string): Promise<void> {
    const _id = toObjectId(id);
    if (!_id) return;
    await this.codes.updateOne({ _id }, { $inc: { attempts: 1 } });
  }

  async markCodeUsed(id: string): Promise<void> {
    const _id = toObjectId(id);
    if (!_id) return;
    await this.codes.updateOne({ _id }, { $set: { used: true } });
  }

  async createSession(session: NewSession): Promise<SessionRecord> {
    const res = await this.sessions.insertOne({ ...session, userId: requireObjectId(session.userId) });
    return { ...session, id: res.insertedId.toString() };
  }

  async findSession(id: string): Promise<SessionRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await this.sessions.findOne({ _id });
    if (!doc) return null;
    return { id: doc._id.toString(), userId: doc.userId.toString(), createdAt: doc.createdAt, expiresAt: doc.expiresAt };
  }

  async deleteSession(id: string): Promise<boolean> {
    const _id = toObjectId(id);
    if (!_id) return false;
    const r = await this.sessions.deleteOne({ _id });
    return r.deletedCount > 0;
  }

  async deleteExpiredSessions(now: Date): Promise<number> {
    const r = await this.sessions.deleteMany({ expiresAt: { $lt: now } });
    return r.deletedCount;
  }
}

/* =========================
   In-memory (STORAGE=memory, tests)
========================= */
export class InMemoryUserStore implements UserStore {
  private readonly users = new Map<string, UserRecord>();
  private readonly codes = new Map<string, OneTimeCodeRecord>();
  private readonly sessions = new Map<string, SessionRecord>();

  async findByEmail(email: string): Promise<UserRecord | null> {
    for (const u of this.users.values()) if (u.email === email) return { ...u };
    return null;
  }

  async findById(id: string): Promise<UserRecord | null> {
    const u = this.users.get(id);
    return u ? { ...u } : null;
  }

  async create(user: NewUser): Promise<UserRecord> {
    if (await this.findByEmail(user.email)) throw new Error(`[user.store] duplicate email ${user.email}`);
    const record = { ...user, id: randomUUID() };
    this.users.set(record.id, record);
    return { ...record };
  }

  async updatePassword(id: string, passwordHash: string): Promise<void> {
    const u = this.users.get(id);
    if (u) this.users.set(id, { ...u, passwordHash, updatedAt: new Date() });
  }

  async markEmailVerified(id: string): Promise<void> {
    const u = this.users.get(id);
    if (u) this.users.set(id, { ...u, emailVerified: true, updatedAt: new Date() });
  }

  async setRole(email: string, role: UserRole): Promise<boolean> {
    const u = await this.findByEmail(email);
    if (!u) return false;
    this.users.set(u.id, { ...u, role, updatedAt: new Date() });
    return true;
  }

  async createCode(code: NewOneTimeCode): Promise<OneTimeCodeRecord> {
    const record = { ...code, id: randomUUID() };
    this.codes.set(record.id, record);
    return { ...record };
  }

  async invalidateCodes(userId: string, purpose: CodePurpose): Promise<void> {
    for (const c of this.codes.values()) {
      if (c.userId === userId && c.purpose === purpose && !c.used) this.codes.set(c.id, { ...c, used: true });
    }
  }

  async findCode(id: string): Promise<OneTimeCodeRecord | null> {
    const c = this.codes.get(id);
    return c ? { ...c } : null;
  }

  async findOpenCode(userId: string, purpose: CodePurpose): Promise<OneTimeCodeRecord | null> {
    let newest: OneTimeCodeRecord | null = null;
    for (const c of this.codes.values()) {
      if (c.userId !== userId || c.purpose !== purpose || c.used) continue;
      if (!newest || c.createdAt >= newest.createdAt) newest = c;
    }
    return newest ? { ...newest } : null;
  }

  async recordFailedAttempt(id: string): Promise<void> {
    const c = this.codes.get(id);
    if (c) this.codes.set(id, { ...c, attempts: c.attempts + 1 });
  }

  async markCodeUsed(id: string): Promise<void> {
    const c = this.codes.get(id);
    if (c) this.codes.set(id, { ...c, used: true });
  }

  async createSession(session: NewSession): Promise<SessionRecord> {
    const record = { ...session, id: randomUUID() };
    this.sessions.set(record.id, record);
    return { ...record };
  }

  async findSession(id: string): Promise<SessionRecord | null> {
    const s = this.sessions.get(id);
    return s ? { ...s } : null;
  }

  async deleteSession(id: string): Promise<boolean> {
    return this.sessions.delete(id);
  }

  async deleteExpiredSessions(now: Date): Promise<number> {
    let removed = 0;
    for (const s of [...this.sessions.values()]) {
      if (s.expiresAt < now && this.sessions.delete(s.id)) removed++;
    }
    return removed;
  }
}
