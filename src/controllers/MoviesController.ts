import { Inject, Injectable } from "@tsed/di";
import { Exception } from "@tsed/exceptions";
import { MAX_RATING, MIN_RATING } from "../config";
import { MovieEntry, MovieListService } from "../services/MovieListService";
import { MovieInput, MoviesService } from "../services/MoviesService";
import { OmdbService } from "../services/OmdbService";
import { PromptService } from "../services/PromptService";
import { SiteGeneratorService } from "../services/SiteGeneratorService";
import { UsersService } from "../services/UsersService";

export interface ActiveUser {
  id: number;
  name: string;
}

const SEPARATOR = "-".repeat(30);
const EMPTY_TITLE = "Movie title cannot be empty. Please try again.";

function formatEntry(movie: MovieEntry): string {
  return `${movie.title} (${movie.year}): ${movie.rating}`;
}

/**
 * Menu actions for the active user. Expected outcomes (duplicates, missing
 * titles, API failures) are reported here; anything else propagates to the
 * session loop.
 */
@Injectable()
export class MoviesController {
  @Inject()
  private moviesService!: MoviesService;
  @Inject()
  private movieListService!: MovieListService;
  @Inject()
  private usersService!: UsersService;
  @Inject()
  private omdbService!: OmdbService;
  @Inject()
  private siteGeneratorService!: SiteGeneratorService;
  @Inject()
  private prompt!: PromptService;

  listMovies(user: ActiveUser): void {
    const movies = this.moviesService.listForUser(user.id);
    if (movies.size === 0) {
      this.prompt.print("No movies in the database.");
      return;
    }

    this.prompt.print(`${movies.size} movies in total`);
    this.prompt.print(SEPARATOR);
    for (const movie of this.movieListService.toEntries(movies)) {
      this.prompt.print(`🎬 ${formatEntry(movie)}`);
      if (movie.posterUrl) {
        this.prompt.print(`   Poster: ${movie.posterUrl}`);
      }
      this.prompt.print(SEPARATOR);
    }
  }

  async addMovie(user: ActiveUser): Promise<void> {
    const title = await this.prompt.askNonEmpty("Enter movie name: ", EMPTY_TITLE);

    if (this.moviesService.listForUser(user.id).has(title)) {
      this.prompt.print(`Movie ${title} already exists!`);
      return;
    }

    this.prompt.print(`Searching OMDb for '${title}'...`);
    let movie: MovieInput | null;
    try {
      movie = await this.omdbService.fetchMovie(title);
    } catch (err) {
      if (err instanceof Exception) {
        this.prompt.print(`Error: ${err.message}`);
        return;
      }
      throw err;
    }

    if (!movie) {
      this.prompt.print(`Movie '${title}' not found in OMDb. Please try another title.`);
      return;
    }

    if (!this.moviesService.add(user.id, movie)) {
      this.prompt.print(`Movie ${movie.title} already exists!`);
      return;
    }
    this.prompt.print(`Movie ${movie.title} successfully added`);
  }

  async deleteMovie(user: ActiveUser): Promise<void> {
    const title = await this.prompt.askNonEmpty("Enter movie name to delete: ", EMPTY_TITLE);
    if (this.moviesService.delete(user.id, title)) {
      this.prompt.print(`Movie ${title} successfully deleted`);
    } else {
      this.prompt.print(`Movie ${title} doesn't exist`);
    }
  }

  async updateMovie(user: ActiveUser): Promise<void> {
    const title = await this.prompt.askNonEmpty("Enter movie name: ", EMPTY_TITLE);
    if (!this.moviesService.listForUser(user.id).has(title)) {
      this.prompt.print(`Movie ${title} doesn't exist`);
      return;
    }

    const rating = await this.prompt.askNumber(`Enter new movie rating (${MIN_RATING}-${MAX_RATING}): `, {
      min: MIN_RATING,
      max: MAX_RATING,
    });
    if (this.moviesService.updateRating(user.id, title, rating)) {
      this.prompt.print(`Movie ${title} successfully updated`);
    } else {
      this.prompt.print(`Movie ${title} doesn't exist`);
    }
  }

  showStats(user: ActiveUser): void {
    const stats = this.movieListService.stats(this.moviesService.listForUser(user.id));
    if (!stats) {
      this.prompt.print("No movies in the database.");
      return;
    }

    this.prompt.print(`Average rating: ${stats.average.toFixed(1)}`);
    this.prompt.print(`Median rating: ${stats.median.toFixed(1)}`);
    this.prompt.print(`Best movie(s) (${stats.best.rating}): ${stats.best.titles.join(", ")}`);
    this.prompt.print(`Worst movie(s) (${stats.worst.rating}): ${stats.worst.titles.join(", ")}`);
  }

  randomMovie(user: ActiveUser): void {
    const movie = this.movieListService.pickRandom(this.moviesService.listForUser(user.id));
    if (!movie) {
      this.prompt.print("No movies in the database.");
      return;
    }
    this.prompt.print(`Your movie for tonight: ${movie.title} (${movie.year}), rated ${movie.rating}`);
  }

  async searchMovie(user: ActiveUser): Promise<void> {
    const movies = this.moviesService.listForUser(user.id);
    const query = await this.prompt.askNonEmpty("Enter part of the movie name: ", EMPTY_TITLE);

    const found = this.movieListService.search(movies, query);
    if (found.length === 0) {
      this.prompt.print("No matching movies found.");
      return;
    }
    found.forEach((m) => this.prompt.print(formatEntry(m)));
  }

  sortByRating(user: ActiveUser): void {
    const movies = this.moviesService.listForUser(user.id);
    if (movies.size === 0) {
      this.prompt.print("No movies in the database to sort.");
      return;
    }

    this.prompt.print("Movies sorted by rating (highest → lowest):");
    this.movieListService.sortByRating(movies, true).forEach((m) => this.prompt.print(formatEntry(m)));
  }

  async sortByYear(user: ActiveUser): Promise<void> {
    const movies = this.moviesService.listForUser(user.id);
    if (movies.size === 0) {
      this.prompt.print("No movies in the database to sort.");
      return;
    }

    const latestFirst = await this.prompt.askYesNo("Show latest movies first? (y/n): ");
    this.prompt.print("Movies sorted by year:");
    this.movieListService.sortByYear(movies, latestFirst).forEach((m) => this.prompt.print(formatEntry(m)));
  }

  async generateWebsite(user: ActiveUser): Promise<void> {
    const movies = this.moviesService.listForUser(user.id);
    if (movies.size === 0) {
      this.prompt.print("Cannot generate website: The database is empty.");
      return;
    }

    try {
      const outputPath = await this.siteGeneratorService.generate(user.name, movies);
      this.prompt.print(`Website was generated successfully: ${outputPath}`);
    } catch (err) {
      if (err instanceof Exception) {
        this.prompt.print(`Error: ${err.message}`);
        return;
      }
      throw err;
    }
  }

  /**
   * @returns true when the account is gone and the session must end
   */
  async deleteUser(user: ActiveUser): Promise<boolean> {
    this.prompt.print(`WARNING: You are about to delete user '${user.name}' and ALL their movies.`);
    const confirmation = (await this.prompt.ask("Type 'DELETE' to confirm this action: ")).trim();
    if (confirmation !== "DELETE") {
      this.prompt.print("User deletion cancelled.");
      return false;
    }

    const { moviesDeleted, userDeleted } = this.usersService.deleteAccount(user.id);
    if (!userDeleted) {
      this.prompt.print(`Error: Could not delete user '${user.name}'.`);
      return false;
    }
    this.prompt.print(`User '${user.name}' and ${moviesDeleted} movie(s) successfully deleted.`);
    return true;
  }
}
