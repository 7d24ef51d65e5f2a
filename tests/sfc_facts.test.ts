import { describe, expect, test } from "vitest";
import { extractSfcFacts } from "../src/validation/sfcFacts.js";

describe("extractSfcFacts", () => {
  test("collects interfaces, props types, imports and variables", () => {
    const source = [
      '<script setup lang="ts">',
      'import { computed } from "vue";',
      'import type { User } from "@/types/user";',
      "",
      "interface UserCardProps {",
      "  user: User;",
      "  compact?: boolean;",
      "}",
      "",
      "const props = defineProps<UserCardProps>();",
      "const displayName = computed<string>(() => props.user.name);",
      "</script>",
      "",
      "<template><div>{{ displayName }}</div></template>",
      ""
    ].join("\n");

    expect(extractSfcFacts(source)).toEqual({
      hasScriptLangTs: true,
      scriptLang: "ts",
      interfaces: ["UserCardProps"],
      typeAnnotations: ["UserCardProps"],
      imports: [
        { source: "vue", isTypeOnly: false },
        { source: "@/types/user", isTypeOnly: true }
      ],
      variables: ["props", "displayName"]
    });
  });

  test("reads type aliases and annotated function parameters", () => {
    const source = [
      '<script lang="ts">',
      'export type Status = "idle" | "busy";',
      "export function label(status: Status, note: Note): string {",
      "  return status + note;",
      "}",
      "</script>",
      ""
    ].join("\n");

    const facts = extractSfcFacts(source);
    expect(facts.typeAnnotations).toEqual(["Status", "Note"]);
    expect(facts.scriptLang).toBe("ts");
    expect(facts.variables).toEqual([]);
  });

  test("returns empty facts without a script block", () => {
    expect(extractSfcFacts("<template><p>hi</p></template>\n")).toEqual({
      hasScriptLangTs: false,
      scriptLang: null,
      interfaces: [],
      typeAnnotations: [],
      imports: [],
      variables: []
    });
  });

  test("reports a plain script block", () => {
    const facts = extractSfcFacts("<script setup>\nconst count = 1;\n</script>\n");
    expect(facts.scriptLang).toBeNull();
    expect(facts.hasScriptLangTs).toBe(false);
    expect(facts.variables).toEqual(["count"]);
  });

  test("throws on a script that does not parse", () => {
    expect(() => extractSfcFacts('<script setup lang="ts">\nconst a = ;\n</script>\n')).toThrow();
  });
});
