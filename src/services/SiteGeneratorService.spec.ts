import { DITest } from "@tsed/di";
import { InternalServerError, NotFound } from "@tsed/exceptions";
import fs from "fs";
import os from "os";
import path from "path";
import { SITE_TEMPLATE_PATH } from "../config";
import { MovieMap } from "./MoviesService";
import { SiteGeneratorService } from "./SiteGeneratorService";

const HEAT_TILE = [
  "<li>",
  '  <div class="movie">',
  '    <img class="movie-poster" src="http://x/heat.jpg" alt="Heat - Rating: 8.3">',
  '    <div class="movie-title">Heat</div>',
  '    <div class="movie-year">(1995)</div>',
  "  </div>",
  "</li>",
].join("\n");

describe("SiteGeneratorService", () => {
  let service: SiteGeneratorService;
  let workDir: string;
  const movies: MovieMap = new Map([["Heat", { year: 1995, rating: 8.3, posterUrl: "http://x/heat.jpg" }]]);

  beforeEach(async () => {
    await DITest.create();
    service = DITest.get<SiteGeneratorService>(SiteGeneratorService);
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "movie-site-"));
  });
  afterEach(async () => {
    fs.rmSync(workDir, { recursive: true, force: true });
    await DITest.reset();
  });

  it("renders one tile per movie", () => {
    expect(service.renderTiles(movies)).toBe(HEAT_TILE);
  });

  it("escapes titles and leaves the poster empty when there is none", () => {
    const tile = service.renderTile({ title: 'Tom & "Jerry"', year: 1940, rating: 7, posterUrl: null });

    expect(tile.split("\n")[2]).toBe('    <img class="movie-poster" src="" alt="Tom &amp; &quot;Jerry&quot; - Rating: 7">');
    expect(tile.split("\n")[3]).toBe('    <div class="movie-title">Tom &amp; &quot;Jerry&quot;</div>');
  });

  it("replaces every placeholder", () => {
    const html = service.render("__TEMPLATE_TITLE__|__TEMPLATE_TITLE__|__TEMPLATE_MOVIE_GRID__", "Mine", "<li></li>");

    expect(html).toBe("Mine|Mine|<li></li>");
  });

  it("writes the page named after the user", async () => {
    const templatePath = path.join(workDir, "template.html");
    fs.writeFileSync(templatePath, "<title>__TEMPLATE_TITLE__</title>\n__TEMPLATE_MOVIE_GRID__");

    const outputPath = await service.generate("Alice Smith", movies, { templatePath, outputDir: workDir });

    expect(outputPath).toBe(path.join(workDir, "Alice_Smith.html"));
    expect(fs.readFileSync(outputPath, "utf8")).toBe(`<title>Alice Smith&#39;s Movie App</title>\n${HEAT_TILE}`);
  });

  it("defaults to the template shipped with the package", async () => {
    const outputPath = await service.generate("Alice", movies, { outputDir: workDir });

    expect(SITE_TEMPLATE_PATH).toBe(path.resolve(__dirname, "..", "..", "static", "index_template.html"));
    expect(fs.readFileSync(outputPath, "utf8")).toContain("<title>Alice&#39;s Movie App</title>");
  });

  it("reports a missing template", async () => {
    const templatePath = path.join(workDir, "missing.html");

    await expect(service.generate("Alice", movies, { templatePath, outputDir: workDir })).rejects.toBeInstanceOf(NotFound);
  });

  it("reports a failed write", async () => {
    const templatePath = path.join(workDir, "template.html");
    fs.writeFileSync(templatePath, "__TEMPLATE_MOVIE_GRID__");

    await expect(
      service.generate("Alice", movies, { templatePath, outputDir: path.join(workDir, "missing-dir") })
    ).rejects.toBeInstanceOf(InternalServerError);
  });

  it("keeps the file name inside the output directory", () => {
    expect(service.outputFileName("../Eve/x")).toBe("___Eve_x.html");
  });
});
