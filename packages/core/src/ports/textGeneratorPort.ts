/**
 * Text Generator Port
 *
 * The service that proposes or rewrites expressions lives outside this
 * repository. Workflows only see it as a request/response function.
 */

export interface TextGenerationRequest {
  /** What the caller wants: 'generate' new candidates or 'polish' an existing one */
  task: 'generate' | 'polish';
  /** Free-form context: the expression to polish, strategy hints, operator names, ... */
  context: Record<string, unknown>;
  /** How many candidates the caller would like back */
  count?: number;
}

export type TextGeneratorPort = (request: TextGenerationRequest) => Promise<string[]>;
