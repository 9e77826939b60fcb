import Handlebars from 'handlebars';
import { MalformedMockTemplateError } from '../types/gateway-config';

export type TemplateRenderer = (captures: Record<string, string>) => string;

/**
 * Collect the data names a template reads (`{{name}}`, `{{#if name}}`,
 * helper arguments), skipping helper names and `@data` variables
 */
class TemplateReferenceCollector extends Handlebars.Visitor {
  public readonly references = new Set<string>();

  constructor(private readonly helperNames: Set<string>) {
    super();
  }

  public override PathExpression(path: hbs.AST.PathExpression): void {
    if (path.data || path.parts.length === 0) {
      return;
    }

    const head = path.parts[0];

    if (!this.helperNames.has(head)) {
      this.references.add(head);
    }
  }
}

/**
 * Return the names referenced by a template body.
 * Throws a MalformedMockTemplateError if the body cannot be parsed.
 *
 * @param content
 * @param location - used in error messages
 */
export const TemplateReferences = (
  content: string,
  location: string
): string[] => {
  let program: hbs.AST.Program;

  try {
    program = Handlebars.parse(content);
  } catch (error) {
    throw new MalformedMockTemplateError(
      `${location}: invalid template: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const collector = new TemplateReferenceCollector(
    new Set(Object.keys(Handlebars.helpers))
  );
  collector.accept(program);

  return [...collector.references];
};

/**
 * Compile a mock body after checking that it only references known captures.
 * Bodies are not HTML: values are inserted without escaping.
 *
 * @param content
 * @param captureNames - captures defined by the mock pattern
 * @param location - used in error messages
 * @returns
 */
export const TemplateParser = (
  content: string,
  captureNames: string[],
  location: string
): TemplateRenderer => {
  const known = new Set(captureNames);
  const unknown = TemplateReferences(content, location).filter(
    (reference) => !known.has(reference)
  );

  if (unknown.length > 0) {
    const available = captureNames.length > 0 ? captureNames.join(', ') : 'none';

    throw new MalformedMockTemplateError(
      `${location}: body references unknown capture(s) ${unknown.join(', ')} (available: ${available})`
    );
  }

  const template = Handlebars.compile<Record<string, string>>(content, {
    strict: true,
    noEscape: true
  });

  return (captures) => template(captures);
};
