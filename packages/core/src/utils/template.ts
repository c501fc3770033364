/**
 * Per-request variables available to templates: the environment snapshot overlaid with
 * `Method`, `Host`, `Path`, `Scheme` and `URL` of the incoming request.
 */
export type TemplateVariables = Readonly<Record<string, string>>;

/** A parsed template that can be expanded against per-request variables. */
export interface Template {
  readonly text: string;
  /**
   * @throws {Error} When the template references a variable that is not defined
   */
  expand(variables: TemplateVariables): string;
}

type TemplateFunction = (value: string) => string;

interface Command {
  variable?: string;
  apply?: TemplateFunction;
}

type Segment = string | Command[];

const TEMPLATE_FUNCTIONS: Partial<Record<string, TemplateFunction>> = {
  URLQueryEscape: queryEscape,
  HTMLEscape: escapeHtml,
};

/**
 * Returns true when `text` contains interpolation markers and must be compiled.
 */
export function isTemplate(text: string): boolean {
  return text.includes('{{') && text.includes('}}');
}

/**
 * Compiles a template in the `{{ }}` action syntax:
 *
 * - `{{.Host}}` or `{{Host}}` inserts a variable
 * - `{{URLQueryEscape .URL}}` applies a function to a variable
 * - `{{.URL | URLQueryEscape}}` pipes a value through functions
 *
 * Available functions are `URLQueryEscape` (form-encoding, spaces become `+`) and
 * `HTMLEscape`.
 *
 * @param text - Template source
 * @returns Compiled template
 * @throws {Error} When an action is unterminated, empty, or calls an unknown function
 *
 * @example
 * ```typescript
 * const template = compileTemplate('https://login.example.com/?return_to={{URLQueryEscape .URL}}');
 * template.expand({ URL: 'https://app.example.com/a b' });
 * // 'https://login.example.com/?return_to=https%3A%2F%2Fapp.example.com%2Fa+b'
 * ```
 */
export function compileTemplate(text: string): Template {
  const segments: Segment[] = [];
  let position = 0;
  while (position < text.length) {
    const open = text.indexOf('{{', position);
    if (open === -1) {
      segments.push(text.slice(position));
      break;
    }
    const close = text.indexOf('}}', open + 2);
    if (close === -1) {
      throw new Error(`template "${text}": unclosed action`);
    }
    if (open > position) {
      segments.push(text.slice(position, open));
    }
    segments.push(parseAction(text, text.slice(open + 2, close)));
    position = close + 2;
  }

  return {
    text,
    expand(variables: TemplateVariables): string {
      return segments
        .map((segment) =>
          typeof segment === 'string' ? segment : runPipeline(segment, variables),
        )
        .join('');
    },
  };
}

function parseAction(text: string, action: string): Command[] {
  const pipeline = action.split('|').map((command) => command.trim().split(/\s+/));
  return pipeline.map((words, index): Command => {
    const [head, argument, ...rest] = words;
    if (!head || rest.length > 0) {
      throw new Error(`template "${text}": malformed action {{${action}}}`);
    }
    const apply = TEMPLATE_FUNCTIONS[head];
    if (argument !== undefined) {
      if (!apply) {
        throw new Error(`template "${text}": function "${head}" not defined`);
      }
      return { apply, variable: variableName(argument) };
    }
    if (index > 0) {
      if (!apply) {
        throw new Error(`template "${text}": function "${head}" not defined`);
      }
      return { apply };
    }
    if (apply) {
      throw new Error(`template "${text}": wrong number of args for ${head}`);
    }
    return { variable: variableName(head) };
  });
}

function variableName(word: string): string {
  return word.startsWith('.') ? word.slice(1) : word;
}

function runPipeline(pipeline: Command[], variables: TemplateVariables): string {
  let value = '';
  for (const command of pipeline) {
    if (command.variable !== undefined) {
      if (!Object.hasOwn(variables, command.variable)) {
        throw new Error(`map has no entry for key "${command.variable}"`);
      }
      value = variables[command.variable];
    }
    if (command.apply) {
      value = command.apply(value);
    }
  }
  return value;
}

/**
 * Escapes a string for use inside a URL query: everything except letters, digits and
 * `-_.~` is percent-encoded and spaces become `+`.
 */
export function queryEscape(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (character) => `%${character.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, '+');
}

/**
 * Escapes `<`, `>`, `&`, `'` and `"` as HTML entities.
 */
export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/'/g, '&#39;')
    .replace(/"/g, '&#34;');
}
