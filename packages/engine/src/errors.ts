/** Base class for every failure raised while resolving or generating items. */
export class GenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingAttributeError extends GenerationError {
  constructor(
    readonly path: string,
    readonly template: string
  ) {
    super(`Cannot resolve "{${path}}" in template ${JSON.stringify(template)}`);
  }
}

export class TemplateSyntaxError extends GenerationError {
  constructor(
    readonly template: string,
    reason: string
  ) {
    super(`Invalid template ${JSON.stringify(template)}: ${reason}`);
  }
}

export class MissingProviderError extends GenerationError {
  constructor(
    readonly generator: string,
    readonly requirement: string
  ) {
    super(
      `${generator} cannot supply "${requirement}": register a get_${requirement} provider for it`
    );
  }
}

export class UnknownPropertyError extends GenerationError {
  constructor(
    readonly tier: string,
    readonly property: string
  ) {
    super(`No property named "${property}" in the ${tier} property table`);
  }
}

export class EmptySourceError extends GenerationError {
  constructor(
    readonly source: string,
    readonly frequency: string
  ) {
    super(`Weighted source "${source}" has nothing to pick under frequency "${frequency}"`);
  }
}
