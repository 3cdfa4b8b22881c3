// ===========================================================================
export class UrlSyntaxError extends Error {
  input: string;

  constructor(message: string, input: string) {
    super(message);
    this.name = "UrlSyntaxError";
    this.input = input;
  }
}

// ===========================================================================
export class InvalidArgumentError extends TypeError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}
