import { DITest } from "@tsed/di";
import { BadRequest } from "@tsed/exceptions";
import { MovieInput, MoviesService } from "./MoviesService";
import { SchemaService } from "./SchemaService";
import { UsersService } from "./UsersService";

const inception: MovieInput = { title: "Inception", year: 2010, rating: 8.8, posterUrl: "http://x/p.jpg" };

describe("MoviesService", () => {
  let moviesService: MoviesService;
  let aliceId: number;
  let bobId: number;

  beforeEach(async () => {
    await DITest.create();
    DITest.get<SchemaService>(SchemaService).initialize();
    moviesService = DITest.get<MoviesService>(MoviesService);

    const usersService = DITest.get<UsersService>(UsersService);
    const alice = usersService.create("Alice");
    const bob = usersService.create("Bob");
    if (alice === null || bob === null) throw new Error("users not created");
    aliceId = alice;
    bobId = bob;
  });
  afterEach(() => DITest.reset());

  it("returns an added movie unchanged", () => {
    expect(moviesService.add(aliceId, inception)).toBe(true);

    expect(moviesService.listForUser(aliceId)).toEqual(
      new Map([["Inception", { year: 2010, rating: 8.8, posterUrl: "http://x/p.jpg" }]])
    );
  });

  it("keeps each user's list separate", () => {
    moviesService.add(aliceId, inception);

    expect(moviesService.listForUser(bobId).size).toBe(0);
    expect(moviesService.add(bobId, { ...inception, rating: 6 })).toBe(true);
    expect(moviesService.listForUser(aliceId).get("Inception")?.rating).toBe(8.8);
    expect(moviesService.listForUser(bobId).get("Inception")?.rating).toBe(6);
  });

  it("rejects a duplicate title for the same user and keeps the first rating", () => {
    moviesService.add(aliceId, inception);

    expect(moviesService.add(aliceId, { ...inception, rating: 2 })).toBe(false);
    expect(moviesService.listForUser(aliceId).get("Inception")?.rating).toBe(8.8);
    expect(moviesService.listForUser(aliceId).size).toBe(1);
  });

  it("validates fields before writing", () => {
    expect(() => moviesService.add(aliceId, { ...inception, title: " " })).toThrow(BadRequest);
    expect(() => moviesService.add(aliceId, { ...inception, year: 2010.5 })).toThrow(BadRequest);
    expect(() => moviesService.add(aliceId, { ...inception, rating: NaN })).toThrow(BadRequest);
    expect(moviesService.listForUser(aliceId).size).toBe(0);
  });

  describe("updateRating()", () => {
    it("changes the rating of the user's own row", () => {
      moviesService.add(aliceId, inception);
      moviesService.add(bobId, inception);

      expect(moviesService.updateRating(aliceId, "Inception", 9.5)).toBe(true);
      expect(moviesService.listForUser(aliceId).get("Inception")?.rating).toBe(9.5);
      expect(moviesService.listForUser(bobId).get("Inception")?.rating).toBe(8.8);
    });

    it("returns false when the title is absent", () => {
      expect(moviesService.updateRating(aliceId, "Alien", 7)).toBe(false);
    });
  });

  describe("delete()", () => {
    it("removes the row", () => {
      moviesService.add(aliceId, inception);

      expect(moviesService.delete(aliceId, "Inception")).toBe(true);
      expect(moviesService.listForUser(aliceId).size).toBe(0);
    });

    it("returns false and leaves the table unchanged when the title is absent", () => {
      moviesService.add(aliceId, inception);

      expect(moviesService.delete(aliceId, "Alien")).toBe(false);
      expect(moviesService.delete(bobId, "Inception")).toBe(false);
      expect(moviesService.listForUser(aliceId).size).toBe(1);
    });
  });

  describe("deleteAllForUser()", () => {
    it("counts the removed rows", () => {
      moviesService.add(aliceId, inception);
      moviesService.add(aliceId, { title: "Heat", year: 1995, rating: 8.3, posterUrl: null });
      moviesService.add(bobId, inception);

      expect(moviesService.deleteAllForUser(aliceId)).toBe(2);
      expect(moviesService.listForUser(aliceId).size).toBe(0);
      expect(moviesService.listForUser(bobId).size).toBe(1);
    });
  });
});
