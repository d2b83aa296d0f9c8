/**
 * Probe source templates
 *
 * Each probe is the run's #include block followed by one exported,
 * zero-argument function. The renderer is created once per resolver.
 */

import { Lang, ScalarTypeTag } from "./types";

export const TYPE_PROBE_SYMBOL = "compute_expression_type";
export const VALUE_PROBE_SYMBOL = "compute_expression_value";

/** C types for each probe return type */
export const C_TYPES: Record<ScalarTypeTag, string> = {
  int: "int",
  long: "long",
  float: "float",
  double: "double",
  string: "const char *",
  pointer: "void *",
};

type TemplateVars = Record<string, string>;

const TEMPLATES = {
  "compute-expression-type.c": `{{includes}}
const char *
${TYPE_PROBE_SYMBOL}(void)
{
  return _Generic(
    ({{expression}}),
    float    : "float",
    double   : "double",
    char *   : "string",
    void *   : "pointer",
    int      : "int",
    long     : "long"
  );
}
`,
  "compute-expression-type.cxx": `{{includes}}
static const char *probe_type(float)        { return "float"; }
static const char *probe_type(double)       { return "double"; }
static const char *probe_type(char *)       { return "string"; }
static const char *probe_type(const char *) { return "string"; }
static const char *probe_type(void *)       { return "pointer"; }
static const char *probe_type(int)          { return "int"; }
static const char *probe_type(long)         { return "long"; }

extern "C" const char *
${TYPE_PROBE_SYMBOL}(void)
{
  return probe_type(({{expression}}));
}
`,
  "compute-expression-value.c": `{{includes}}
{{ctype}}
${VALUE_PROBE_SYMBOL}(void)
{
  return ({{expression}});
}
`,
  "compute-expression-value.cxx": `{{includes}}
extern "C" {{ctype}}
${VALUE_PROBE_SYMBOL}(void)
{
  return ({{expression}});
}
`,
} as const;

export type TemplateName = keyof typeof TEMPLATES;

export class ProbeTemplates {
  private readonly includes: string;

  constructor(headers: readonly string[], private readonly lang: Lang) {
    this.includes = headers.map((header) => `#include <${header}>`).join("\n");
  }

  /**
   * Fill `{{name}}` placeholders; an unknown placeholder is an error
   */
  render(name: TemplateName, vars: TemplateVars): string {
    const all: TemplateVars = { includes: this.includes, ...vars };
    return TEMPLATES[name].replace(/\{\{(\w+)\}\}/g, (_match, key: string) => {
      const value = all[key];
      if (value === undefined) {
        throw new Error(`template ${name} has no value for ${key}`);
      }
      return value;
    });
  }

  typeProbe(expression: string): string {
    return this.render(this.lang === "c" ? "compute-expression-type.c" : "compute-expression-type.cxx", {
      expression,
    });
  }

  valueProbe(type: ScalarTypeTag, expression: string): string {
    return this.render(this.lang === "c" ? "compute-expression-value.c" : "compute-expression-value.cxx", {
      ctype: C_TYPES[type],
      expression,
    });
  }
}
