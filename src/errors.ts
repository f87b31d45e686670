export class RequirementParseError extends Error {
  constructor(
    message: string,
    readonly text: string
  ) {
    super(`${message}: ${JSON.stringify(text)}`);
    this.name = 'RequirementParseError';
  }
}
