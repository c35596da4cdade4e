import fs from 'fs/promises';
import { describeError } from '../common/errors';

type PdfJs = typeof import('pdfjs-dist');

let pdfjsPromise: Promise<PdfJs> | null = null;

// pdfjs runs its worker in-process under Node; it only needs to know where the worker module lives.
const loadPdfJs = (): Promise<PdfJs> => {
  if (!pdfjsPromise) {
    pdfjsPromise = import('pdfjs-dist').then((pdfjs) => {
      pdfjs.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/build/pdf.worker.js');
      return pdfjs;
    });
  }
  return pdfjsPromise;
};

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const errorMarker = (error: unknown) => `[Error: ${describeError(error)}]`;

/**
 * Title from the document information dictionary. Returns an empty string when
 * the document has none and an `[Error: …]` marker when it cannot be parsed.
 */
export const readPdfTitle = async (filePath: string): Promise<string> => {
  try {
    const data = new Uint8Array(await fs.readFile(filePath));
    const pdfjs = await loadPdfJs();
    const loadingTask = pdfjs.getDocument({ data, verbosity: pdfjs.VerbosityLevel.ERRORS, isEvalSupported: false });
    try {
      const pdf = await loadingTask.promise;
      const { info } = await pdf.getMetadata();
      const title: unknown = isObject(info) ? info.Title : undefined;
      return typeof title === 'string' ? title : '';
    } finally {
      await loadingTask.destroy();
    }
  } catch (error) {
    return errorMarker(error);
  }
};
