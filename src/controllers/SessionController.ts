import { Inject, Injectable } from "@tsed/di";
import { $log } from "@tsed/logger";
import { InputClosedError, PromptService } from "../services/PromptService";
import { UsersService } from "../services/UsersService";
import { ActiveUser, MoviesController } from "./MoviesController";

export type SessionOutcome = "exit" | "switch";

const MENU = [
  "0. Exit",
  "1. List movies",
  "2. Add movie",
  "3. Delete movie",
  "4. Update movie",
  "5. Stats",
  "6. Random movie",
  "7. Search movie",
  "8. Movies sorted by rating",
  "9. Movies sorted by year",
  "10. Generate website",
  "11. Switch user",
  "12. Delete user",
];

@Injectable()
export class SessionController {
  @Inject()
  private usersService!: UsersService;
  @Inject()
  private moviesController!: MoviesController;
  @Inject()
  private prompt!: PromptService;

  /**
   * Runs user selection and menu sessions until the user exits or input ends.
   */
  async run(): Promise<void> {
    this.prompt.print("********** My Movies App **********\n");
    try {
      for (;;) {
        const user = await this.selectUser();
        if ((await this.runUserSession(user)) === "exit") return;
      }
    } catch (err) {
      if (err instanceof InputClosedError) {
        $log.debug("Input closed, leaving the session loop");
        return;
      }
      throw err;
    }
  }

  async selectUser(): Promise<ActiveUser> {
    for (;;) {
      const users = this.usersService.listAll();
      this.prompt.print("\nWelcome to the Movie App! 🎬");
      this.prompt.print("Select a user:");
      users.forEach((u, i) => this.prompt.print(`${i + 1}. ${u.name}`));
      const createOption = users.length + 1;
      this.prompt.print(`${createOption}. Create new user`);

      const choice = (await this.prompt.ask("Enter choice: ")).trim();
      const index = /^\d+$/.test(choice) ? parseInt(choice, 10) : NaN;

      if (index >= 1 && index <= users.length) {
        const { id, name } = users[index - 1];
        this.prompt.print(`\nWelcome back, ${name}! 🎬`);
        return { id, name };
      }

      if (index === createOption) {
        const name = await this.prompt.askNonEmpty("Enter new username: ", "User name cannot be empty. Please try again.");
        const id = this.usersService.create(name);
        if (id !== null) {
          this.prompt.print(`User '${name}' created!`);
          return { id, name };
        }
        this.prompt.print(`User '${name}' already exists. Please choose another name.`);
        continue;
      }

      this.prompt.print("Invalid choice. Please try again.");
    }
  }

  async runUserSession(user: ActiveUser): Promise<SessionOutcome> {
    for (;;) {
      try {
        this.printMenu(user);
        const choice = (await this.prompt.ask(`Enter choice (0-${MENU.length - 1}): `)).trim();
        this.prompt.print();

        switch (choice) {
          case "0":
            this.prompt.print(`Bye, ${user.name}! 👋`);
            return "exit";
          case "1":
            this.moviesController.listMovies(user);
            break;
          case "2":
            await this.moviesController.addMovie(user);
            break;
          case "3":
            await this.moviesController.deleteMovie(user);
            break;
          case "4":
            await this.moviesController.updateMovie(user);
            break;
          case "5":
            this.moviesController.showStats(user);
            break;
          case "6":
            this.moviesController.randomMovie(user);
            break;
          case "7":
            await this.moviesController.searchMovie(user);
            break;
          case "8":
            this.moviesController.sortByRating(user);
            break;
          case "9":
            await this.moviesController.sortByYear(user);
            break;
          case "10":
            await this.moviesController.generateWebsite(user);
            break;
          case "11":
            this.prompt.print(`Switching user from ${user.name}...`);
            return "switch";
          case "12":
            if (await this.moviesController.deleteUser(user)) return "switch";
            break;
          default:
            this.prompt.print(`Invalid choice. Please enter a number from 0-${MENU.length - 1}.`);
        }

        this.prompt.print();
        await this.prompt.waitForEnter();
      } catch (err) {
        if (err instanceof InputClosedError) throw err;
        $log.error("Menu action failed", err);
        const message = err instanceof Error ? err.message : String(err);
        this.prompt.print(`\nOops! Something went wrong: ${message}`);
        this.prompt.print("Don't worry, you can try again.\n");
      }
    }
  }

  private printMenu(user: ActiveUser): void {
    this.prompt.print(`\n--- Active User: ${user.name} ---`);
    this.prompt.print("Menu:");
    MENU.forEach((line) => this.prompt.print(line));
    this.prompt.print();
  }
}
