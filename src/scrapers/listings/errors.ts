export class MalformedSourceError extends Error {
  readonly url: string;

  constructor(url: string, reason: string, content?: string) {
    const preview = content ? ` Preview: ${content.slice(0, 200).replace(/\s+/g, ' ')}` : '';
    super(`Malformed document ${url}: ${reason}.${preview}`);
    this.name = 'MalformedSourceError';
    this.url = url;
  }
}

export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
  }
}
