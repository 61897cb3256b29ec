/**
 * Stateful check run before forwarding a definition file change. Implementations remember the
 * last content they accepted and may block on file I/O.
 */
export interface DefinitionValidatorPort {
  validate(): boolean;
}

export type DefinitionValidatorFactory = (filePath: string) => DefinitionValidatorPort;
