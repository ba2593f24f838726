import dotenv from "dotenv";
import path from "path";

// Must be imported before any module that reads process.env.
// dotenv.config() never overrides variables that are already set.
if (process.env.NODE_ENV === "production") {
  dotenv.config({ path: path.resolve(process.cwd(), ".env.production") });
}
dotenv.config();
