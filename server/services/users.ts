import { asc, eq, sql } from "drizzle-orm";
import { db } from "../config/database.js";
import { users, type InsertUser, type User } from "../../shared/schema.js";
import { notFound, translateIntegrityError } from "../middleware/errorHandler.js";
import { buildFilterCondition, buildOrderBy, type Filters } from "./filterUtils.js";
import { userTarget } from "./filterTargets.js";
import { offsetOf, toPage, type Page, type PageRequest } from "./paginationUtils.js";
import { countMatching, hasChanges } from "./repository.js";

function integrityMessages(data: Partial<InsertUser>) {
  return {
    unique: {
      email: `User with email ${data.email} already exists`,
      nickname: `User with nickname ${data.nickname} already exists`,
    },
  };
}

export async function listUsers(): Promise<User[]> {
  return db.query.users.findMany({ orderBy: asc(users.id) });
}

export async function searchUsers(page: PageRequest, filters: Filters): Promise<Page<User>> {
  const [items, total] = await Promise.all([
    db.query.users.findMany({
      where: (fields) => buildFilterCondition(userTarget, fields, filters),
      orderBy: (fields) => buildOrderBy(userTarget, fields, page),
      limit: page.size,
      offset: offsetOf(page),
    }),
    countMatching(userTarget, filters),
  ]);
  return toPage(items, total, page);
}

export async function findUserById(id: number): Promise<User | undefined> {
  return db.query.users.findFirst({ where: eq(users.id, id) });
}

export async function getUserById(id: number): Promise<User> {
  const user = await findUserById(id);
  if (!user) throw notFound(`User with id ${id} not found`);
  return user;
}

export async function getUserByEmail(email: string): Promise<User> {
  const user = await db.query.users.findFirst({ where: eq(users.email, email) });
  if (!user) throw notFound(`User with email ${email} not found`);
  return user;
}

export async function createUser(data: InsertUser): Promise<User> {
  try {
    const [user] = await db.insert(users).values(data).returning();
    console.log(`[users] created user ${user.id}`);
    return user;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function updateUser(id: number, data: Partial<InsertUser>): Promise<User> {
  const existing = await getUserById(id);
  if (!hasChanges(data)) return existing;
  try {
    const [user] = await db.update(users).set(data).where(eq(users.id, id)).returning();
    return user;
  } catch (error) {
    throw translateIntegrityError(error, integrityMessages(data));
  }
}

export async function deleteUser(id: number): Promise<void> {
  const deleted = await db.delete(users).where(eq(users.id, id)).returning({ id: users.id });
  if (deleted.length === 0) throw notFound(`User with id ${id} not found. Cannot delete.`);
}

export async function incrementProductsSent(userId: number, executor: Pick<typeof db, "update"> = db): Promise<void> {
  await executor
    .update(users)
    .set({ nbProductsSent: sql`${users.nbProductsSent} + 1` })
    .where(eq(users.id, userId));
}
