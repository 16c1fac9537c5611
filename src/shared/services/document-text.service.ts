import { Injectable } from '@nestjs/common'
import { readFile } from 'fs/promises'
import path from 'path'
import { PdfTextService } from './pdf-text.service'

export const SUPPORTED_DOCUMENT_EXTENSIONS = ['.txt', '.pdf'] as const

export class UnsupportedDocumentError extends Error {
  constructor(fileName: string) {
    super(`Unsupported document type: ${fileName}`)
    this.name = 'UnsupportedDocumentError'
  }
}

export function isSupportedDocument(fileName: string): boolean {
  const extension = path.extname(fileName).toLowerCase()
  return SUPPORTED_DOCUMENT_EXTENSIONS.some((supported) => supported === extension)
}

/**
 * DocumentTextService
 *
 * Purpose: Decode a résumé, cover letter or job posting into plain text.
 * TXT is read as UTF-8; PDF goes through PdfTextService.
 */
@Injectable()
export class DocumentTextService {
  constructor(private readonly pdfTextService: PdfTextService) {}

  async extractText(filePath: string): Promise<string> {
    if (!isSupportedDocument(filePath)) {
      throw new UnsupportedDocumentError(path.basename(filePath))
    }
    return this.extractFromBuffer(await readFile(filePath), path.basename(filePath))
  }

  async extractFromBuffer(buffer: Buffer, fileName: string): Promise<string> {
    const extension = path.extname(fileName).toLowerCase()

    if (extension === '.pdf') {
      return this.pdfTextService.extractText(buffer)
    }
    if (extension === '.txt') {
      return this.pdfTextService.normalizeText(buffer.toString('utf-8'))
    }
    throw new UnsupportedDocumentError(fileName)
  }
}
