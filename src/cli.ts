import { readFile } from "node:fs/promises";

import { runLayoutCli } from "./layout_cli";

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf8");
}

void runLayoutCli(process.argv.slice(2), {
  env: process.env,
  readFile: (path) => readFile(path, "utf8"),
  readStdin,
  // eslint-disable-next-line no-console
  writeLine: (line) => console.log(line),
})
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error(err);
    process.exitCode = 1;
  });
