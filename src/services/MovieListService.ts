import { Injectable } from "@tsed/di";
import { MovieDetails, MovieMap } from "./MoviesService";

export interface MovieEntry extends MovieDetails {
  title: string;
}

export interface RatingExtreme {
  rating: number;
  titles: string[];
}

export interface MovieStats {
  average: number;
  median: number;
  best: RatingExtreme;
  worst: RatingExtreme;
}

/**
 * In-memory views over a user's list. Sorts are stable and use a single key,
 * so ties keep the order the list was read in.
 */
@Injectable()
export class MovieListService {

  toEntries(movies: MovieMap): MovieEntry[] {
    return Array.from(movies, ([title, details]) => ({ title, ...details }));
  }

  sortByRating(movies: MovieMap, descending: boolean = true): MovieEntry[] {
    const direction = descending ? -1 : 1;
    return this.toEntries(movies).sort((a, b) => (a.rating - b.rating) * direction);
  }

  sortByYear(movies: MovieMap, descending: boolean = false): MovieEntry[] {
    const direction = descending ? -1 : 1;
    return this.toEntries(movies).sort((a, b) => (a.year - b.year) * direction);
  }

  search(movies: MovieMap, query: string): MovieEntry[] {
    const needle = query.trim().toLowerCase();
    return this.toEntries(movies).filter((m) => m.title.toLowerCase().includes(needle));
  }

  stats(movies: MovieMap): MovieStats | null {
    const entries = this.toEntries(movies);
    if (entries.length === 0) return null;

    const ratings = entries.map((m) => m.rating);
    const sorted = [...ratings].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    const median = sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];

    const max = sorted[sorted.length - 1];
    const min = sorted[0];

    return {
      average: ratings.reduce((s, r) => s + r, 0) / ratings.length,
      median,
      best: { rating: max, titles: entries.filter((m) => m.rating === max).map((m) => m.title) },
      worst: { rating: min, titles: entries.filter((m) => m.rating === min).map((m) => m.title) },
    };
  }

  pickRandom(movies: MovieMap, random: () => number = Math.random): MovieEntry | null {
    const entries = this.toEntries(movies);
    if (entries.length === 0) return null;
    return entries[Math.floor(random() * entries.length)];
  }
}
