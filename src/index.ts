import { createProgram } from "src/cli";
import { errorMessage } from "src/utils/errors";
import { errorLogger } from "src/utils/logger";

void createProgram()
    .parseAsync(process.argv)
    .catch((error) => {
        errorLogger("Run failed:", errorMessage(error));
        if (error instanceof Error && error.stack) {
            errorLogger("Stack trace:", error.stack);
        }
        process.exitCode = 1;
    });
