/**
 * Language model capability. The only thing the pipeline ever asks a model for
 * is text; scores never depend on it.
 */
export interface TextGenerator {
  readonly available: boolean
  readonly model: string | null
  generate(prompt: string): Promise<string>
}

export const TEXT_GENERATOR = Symbol('TEXT_GENERATOR')

export class TextGeneratorUnavailableError extends Error {
  constructor() {
    super('No language model configured')
    this.name = 'TextGeneratorUnavailableError'
  }
}

/**
 * Default capability when no model is configured: always unavailable
 */
export class UnavailableTextGenerator implements TextGenerator {
  readonly available = false
  readonly model = null

  async generate(): Promise<string> {
    throw new TextGeneratorUnavailableError()
  }
}
