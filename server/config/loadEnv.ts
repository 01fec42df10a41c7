import dotenv from "dotenv";
import path from "path";

// Side-effect module: import it before anything that reads process.env.
// Earlier files win; dotenv never overrides a variable that is already set.
const nodeEnv = process.env.NODE_ENV ?? "development";

for (const file of [`.env.${nodeEnv}.local`, `.env.${nodeEnv}`, ".env"]) {
  dotenv.config({ path: path.resolve(process.cwd(), file) });
}
