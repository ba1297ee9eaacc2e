import chalk from "chalk";
import { ZodError } from "zod";
import { isStoreError } from "../errors";

/**
 * Print a command failure and exit with status 1
 */
export function fail(error: unknown): never {
  if (isStoreError(error)) {
    console.error(chalk.red(`✗ ${error.message}`));
  } else if (error instanceof ZodError) {
    console.error(chalk.red("✗ Invalid options or configuration:"));
    for (const issue of error.issues) {
      console.error(chalk.gray(`  ${issue.path.join(".") || "(root)"}: ${issue.message}`));
    }
  } else {
    console.error(error);
  }
  process.exit(1);
}
