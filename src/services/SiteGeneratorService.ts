import { Inject, Injectable } from "@tsed/di";
import { InternalServerError, NotFound } from "@tsed/exceptions";
import { $log } from "@tsed/logger";
import { readFile, writeFile } from "fs/promises";
import path from "path";
import { SITE_OUTPUT_DIR, SITE_TEMPLATE_PATH, TEMPLATE_GRID_TOKEN, TEMPLATE_TITLE_TOKEN } from "../config";
import { MovieEntry, MovieListService } from "./MovieListService";
import { MovieMap } from "./MoviesService";

export interface SiteOptions {
  templatePath?: string;
  outputDir?: string;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c]);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

@Injectable()
export class SiteGeneratorService {
  @Inject()
  private movieListService!: MovieListService;

  renderTile(movie: MovieEntry): string {
    const title = escapeHtml(movie.title);
    return [
      "<li>",
      '  <div class="movie">',
      `    <img class="movie-poster" src="${escapeHtml(movie.posterUrl ?? "")}" alt="${title} - Rating: ${movie.rating}">`,
      `    <div class="movie-title">${title}</div>`,
      `    <div class="movie-year">(${movie.year})</div>`,
      "  </div>",
      "</li>",
    ].join("\n");
  }

  renderTiles(movies: MovieMap): string {
    return this.movieListService.toEntries(movies).map((m) => this.renderTile(m)).join("\n");
  }

  render(template: string, pageTitle: string, grid: string): string {
    return template
      .split(TEMPLATE_TITLE_TOKEN).join(escapeHtml(pageTitle))
      .split(TEMPLATE_GRID_TOKEN).join(grid);
  }

  outputFileName(userName: string): string {
    return `${userName.replace(/[^A-Za-z0-9_-]/g, "_")}.html`;
  }

  /**
   * Writes `<userName>.html` from the page template.
   *
   * @returns the path of the written file
   * @throws NotFound when the template is missing, InternalServerError when
   * the page cannot be read or written
   */
  async generate(userName: string, movies: MovieMap, options: SiteOptions = {}): Promise<string> {
    const templatePath = options.templatePath ?? SITE_TEMPLATE_PATH;
    const outputPath = path.join(options.outputDir ?? SITE_OUTPUT_DIR, this.outputFileName(userName));

    let template: string;
    try {
      template = await readFile(templatePath, "utf8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        throw new NotFound(`HTML template file not found at ${templatePath}`);
      }
      throw new InternalServerError(`Could not read template ${templatePath}`, err);
    }

    const html = this.render(template, `${userName}'s Movie App`, this.renderTiles(movies));

    try {
      await writeFile(outputPath, html, "utf8");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new InternalServerError(`Error writing the output file ${outputPath}: ${reason}`, err);
    }

    $log.info(`Generated ${outputPath} with ${movies.size} movie(s)`);
    return outputPath;
  }
}
