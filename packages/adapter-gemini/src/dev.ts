import "dotenv/config";
import { makeGeminiSuggester } from "./index.js";

const suggester = makeGeminiSuggester();
const language = process.argv[2] ?? "fr";

const answer = await suggester.suggest(
  "<BEA-001112> Test \"SELECT 1 FROM DUAL\" set up for pool \"AppDS\" failed with exception: java.sql.SQLException: ORA-01017",
  language,
);
console.log("Reformulated:", answer.reformulated);
console.log("Solution:", answer.solution);
