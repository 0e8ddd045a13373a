import { Inject, Injectable } from "@tsed/di";
import { BadRequest } from "@tsed/exceptions";
import { and, eq } from "drizzle-orm";
import * as schema from "../db/schema";
import { DatabaseService } from "./DatabaseService";

export interface MovieDetails {
    year: number;
    rating: number;
    posterUrl: string | null;
}

export interface MovieInput extends MovieDetails {
    title: string;
}

/** A user's list keyed by title. Iteration order follows the rows as read. */
export type MovieMap = Map<string, MovieDetails>;

@Injectable()
export class MoviesService {

    @Inject()
    private databaseService!: DatabaseService;

    listForUser(userId: number): MovieMap {
        const rows = this.databaseService.getDb()
            .select({
                title: schema.movies.title,
                year: schema.movies.year,
                rating: schema.movies.rating,
                posterUrl: schema.movies.posterUrl,
            })
            .from(schema.movies)
            .where(eq(schema.movies.userId, userId))
            .all();

        return new Map(rows.map((r) => [r.title, { year: r.year, rating: r.rating, posterUrl: r.posterUrl }]));
    }

    /**
     * @returns false when the user already has a movie with this title; the
     * stored row is left as it was
     */
    add(userId: number, movie: MovieInput): boolean {
        const title = this.validateTitle(movie.title);
        if (!Number.isInteger(movie.year)) {
            throw new BadRequest(`Invalid year: ${movie.year}`);
        }
        this.validateRating(movie.rating);

        const result = this.databaseService.getDb()
            .insert(schema.movies)
            .values({
                title,
                year: movie.year,
                rating: movie.rating,
                posterUrl: movie.posterUrl,
                userId,
            })
            .onConflictDoNothing({ target: [schema.movies.title, schema.movies.userId] })
            .run();
        return result.changes > 0;
    }

    updateRating(userId: number, title: string, rating: number): boolean {
        this.validateRating(rating);
        const result = this.databaseService.getDb()
            .update(schema.movies)
            .set({ rating })
            .where(and(eq(schema.movies.userId, userId), eq(schema.movies.title, title.trim())))
            .run();
        return result.changes > 0;
    }

    delete(userId: number, title: string): boolean {
        const result = this.databaseService.getDb()
            .delete(schema.movies)
            .where(and(eq(schema.movies.userId, userId), eq(schema.movies.title, title.trim())))
            .run();
        return result.changes > 0;
    }

    /** Must run before the user row is removed: movies.user_id is a foreign key. */
    deleteAllForUser(userId: number): number {
        return this.databaseService.getDb()
            .delete(schema.movies)
            .where(eq(schema.movies.userId, userId))
            .run()
            .changes;
    }

    private validateTitle(title: string): string {
        const trimmed = title.trim();
        if (trimmed.length === 0) {
            throw new BadRequest("Movie title cannot be empty");
        }
        return trimmed;
    }

    private validateRating(rating: number): void {
        if (!Number.isFinite(rating)) {
            throw new BadRequest(`Invalid rating: ${rating}`);
        }
    }
}
