import { Injectable } from '@nestjs/common'
import { LoggerService } from './logger.service'

/**
 * PdfTextService - Stage 0
 *
 * Purpose: Convert PDF bytes into raw text deterministically.
 *
 * Allowed logic:
 * - Deterministic PDF → text extraction
 * - Normalization (whitespace collapse per line, single blank lines kept as paragraph breaks)
 *
 * Forbidden logic:
 * - Any rule evaluation
 * - Any inference / AI
 */
@Injectable()
export class PdfTextService {
  constructor(private readonly logger: LoggerService) {}

  /**
   * @throws Error('PDF_EMPTY_TEXT') when the document has no extractable text
   * @throws Error('PDF_UNREADABLE') when the bytes cannot be parsed
   */
  async extractText(buffer: Buffer): Promise<string> {
    try {
      // pdf-parse pulls in pdf.js; load it only when a PDF actually shows up
      const { PDFParse } = await import('pdf-parse')
      const parser = new PDFParse({ data: new Uint8Array(buffer) })
      try {
        const data = await parser.getText()
        const normalizedText = this.normalizeText(data.text)

        if (normalizedText.length === 0) {
          throw new Error('PDF_EMPTY_TEXT')
        }
        return normalizedText
      } finally {
        await parser.destroy()
      }
    } catch (error) {
      if (error instanceof Error && error.message === 'PDF_EMPTY_TEXT') {
        throw error
      }
      this.logger.logError(error, { service: 'PdfTextService', operation: 'extractText' })
      throw new Error('PDF_UNREADABLE')
    }
  }

  /**
   * Normalize text deterministically
   * - Collapse whitespace inside each line
   * - Keep at most one blank line between paragraphs (experience entries rely on them)
   */
  normalizeText(text: string): string {
    return text
      .split(/\r?\n/)
      .map((line) => line.replace(/\s+/g, ' ').trim())
      .join('\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim()
  }
}
