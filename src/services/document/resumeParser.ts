import { extractText } from 'unpdf';
import { describeError } from '../ai/textModel';

export interface ExtractedDocument {
  text: string;
  warning: string | null;
}

/** Page-by-page text of an uploaded PDF. A broken file yields empty text and a warning. */
export const extractTextFromPdf = async (data: Buffer): Promise<ExtractedDocument> => {
  try {
    const { text } = await extractText(new Uint8Array(data), { mergePages: false });
    return { text: text.join('\n'), warning: null };
  } catch (error) {
    console.warn('⚠️ Failed to read PDF resume:', error);
    return { text: '', warning: `Error reading PDF: ${describeError(error)}` };
  }
};
