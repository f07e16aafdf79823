import { createAnalyzer } from "./analyzer/createAnalyzer.js";
import { readLogLines } from "./io/readLines.js";

const analyzer = createAnalyzer();

const path = process.argv[2];
if (!path) {
  console.error("usage: dev:core <server.log> [topK] [minCount]");
  process.exit(1);
}

const lines = await readLogLines(path);
const [report] = await analyzer.analyze([{ filename: path, lines }], {
  topK: process.argv[3],
  minCount: process.argv[4],
});

for (const g of report?.groups ?? []) {
  console.log(`\n${g.count}x ${g.signature}`);
  console.log(`   ${g.representativeMessage}`);
  console.log(`   lines: ${g.occurrences.map((o) => o.lineNumber).join(", ")}`);
}
