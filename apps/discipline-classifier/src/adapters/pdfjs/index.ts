export { PdfJsTextExtractor, joinTextItems } from "./PdfJsTextExtractor.js";
