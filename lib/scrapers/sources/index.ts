import { registerScraper } from "../registry";
import { curatedScraper } from "./curated";
import { devpostScraper } from "./devpost";
import { mlhScraper } from "./mlh";

export function registerAllScrapers(): void {
  registerScraper(curatedScraper);
  registerScraper(devpostScraper);
  registerScraper(mlhScraper);
}

export { curatedScraper, devpostScraper, mlhScraper };
