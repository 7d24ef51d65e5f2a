/**
 * Standalone SFC parser process: `node parseSfcCli.js <file.vue>`.
 * Prints the extracted facts as JSON on stdout; on failure prints `{"error": ...}` to stderr
 * and exits 1.
 */
import { readFileSync } from "node:fs";
import process from "node:process";
import { extractSfcFacts } from "./sfcFacts.js";

function fail(message: string): never {
  process.stderr.write(`${JSON.stringify({ error: message })}\n`);
  process.exit(1);
}

const filePath = process.argv[2];
if (!filePath) {
  fail("Usage: parseSfcCli <vue-file-path>");
}

let source = "";
try {
  source = readFileSync(filePath, "utf8");
} catch (error) {
  fail(`Failed to read file: ${error instanceof Error ? error.message : String(error)}`);
}

try {
  const facts = extractSfcFacts(source, filePath);
  process.stdout.write(
    `${JSON.stringify({
      has_script_lang_ts: facts.hasScriptLangTs,
      script_lang: facts.scriptLang,
      interfaces: facts.interfaces,
      type_annotations: facts.typeAnnotations,
      imports: facts.imports,
      variables: facts.variables
    })}\n`
  );
} catch (error) {
  fail(error instanceof Error ? error.message : String(error));
}
