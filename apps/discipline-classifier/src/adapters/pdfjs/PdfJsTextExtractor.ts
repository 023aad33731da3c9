/**
 * @fileoverview PDF text extraction with pdf.js
 *
 * Uses the legacy build, which runs in Node without a worker setup.
 *
 * @module adapters/pdfjs/PdfJsTextExtractor
 */

import * as pdfjs from "pdfjs-dist/legacy/build/pdf.mjs";
import { errorMessage } from "@papertriage/engine";
import type { PageText, PdfTextExtractor } from "../../domain/ports/index.js";

/**
 * Join a page's text items, breaking lines where pdf.js reports an end of line.
 */
export function joinTextItems(items: ReadonlyArray<{ str: string; hasEOL: boolean }>): string {
    let text = "";
    for (const item of items) {
        text += item.str;
        text += item.hasEOL ? "\n" : (item.str.endsWith(" ") ? "" : " ");
    }
    return text
        .split("\n")
        .map((line) => line.replace(/[ \t]+/g, " ").trim())
        .join("\n")
        .trim();
}

export class PdfJsTextExtractor implements PdfTextExtractor {
    /**
     * @throws Error when pdf.js cannot open the document at all
     */
    async extractPages(bytes: Uint8Array): Promise<readonly PageText[]> {
        // pdf.js takes ownership of the buffer it is given
        const loadingTask = pdfjs.getDocument({ data: new Uint8Array(bytes), isEvalSupported: false });
        const doc = await loadingTask.promise;

        try {
            const pages: PageText[] = [];

            for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
                try {
                    const page = await doc.getPage(pageNumber);
                    const content = await page.getTextContent();
                    const items = content.items.flatMap((item) => ("str" in item ? [item] : []));
                    pages.push({ pageNumber, ok: true, text: joinTextItems(items) });
                    page.cleanup();
                }
                catch (error) {
                    pages.push({ pageNumber, ok: false, error: errorMessage(error) });
                }
            }

            return pages;
        }
        finally {
            await loadingTask.destroy();
        }
    }
}
