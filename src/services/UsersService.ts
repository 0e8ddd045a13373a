import { Inject, Injectable } from "@tsed/di";
import { BadRequest } from "@tsed/exceptions";
import { $log } from "@tsed/logger";
import { asc, eq } from "drizzle-orm";
import * as schema from "../db/schema";
import { DatabaseService } from "./DatabaseService";
import { MoviesService } from "./MoviesService";

export interface AccountDeletion {
  moviesDeleted: number;
  userDeleted: boolean;
}

@Injectable()
export class UsersService {
  @Inject()
  private databaseService!: DatabaseService;
  @Inject()
  private moviesService!: MoviesService;

  /** Exact, case-sensitive match on the trimmed name, as `create` stores it. */
  findByName(name: string): schema.User | null {
    const user = this.databaseService.getDb()
      .select()
      .from(schema.users)
      .where(eq(schema.users.name, name.trim()))
      .get();
    return user ?? null;
  }

  /**
   * @returns the new user's id, or null when the name is taken
   */
  create(name: string): number | null {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      throw new BadRequest("User name cannot be empty");
    }

    const created = this.databaseService.getDb()
      .insert(schema.users)
      .values({ name: trimmed })
      .onConflictDoNothing({ target: schema.users.name })
      .returning({ id: schema.users.id })
      .get();
    return created?.id ?? null;
  }

  listAll(): schema.User[] {
    return this.databaseService.getDb()
      .select()
      .from(schema.users)
      .orderBy(asc(schema.users.id))
      .all();
  }

  delete(userId: number): boolean {
    const result = this.databaseService.getDb()
      .delete(schema.users)
      .where(eq(schema.users.id, userId))
      .run();
    return result.changes > 0;
  }

  /**
   * Removes the user's movies and then the user row, in one transaction.
   */
  deleteAccount(userId: number): AccountDeletion {
    const deletion = this.databaseService.transaction(() => {
      const moviesDeleted = this.moviesService.deleteAllForUser(userId);
      const userDeleted = this.delete(userId);
      return { moviesDeleted, userDeleted };
    });
    if (deletion.userDeleted) $log.info(`Deleted user ${userId} with ${deletion.moviesDeleted} movie(s)`);
    return deletion;
  }
}
