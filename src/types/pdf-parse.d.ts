// The package root runs a self-test when loaded as an ES module import, so the
// code imports the library entry directly. That subpath carries no typings.
declare module 'pdf-parse/lib/pdf-parse.js' {
    export interface TextItem {
        str: string;
        transform: number[];
    }

    export interface PageData {
        /** 0-based page index */
        pageIndex: number;
        getTextContent(options?: {
            normalizeWhitespace?: boolean;
            disableCombineTextItems?: boolean;
        }): Promise<{ items: TextItem[] }>;
    }

    export interface Options {
        pagerender?: (pageData: PageData) => Promise<string> | string;
        max?: number;
        version?: string;
    }

    export interface Result {
        numpages: number;
        numrender: number;
        info: Record<string, unknown> | null;
        metadata: unknown;
        version: string;
        text: string;
    }

    export default function pdfParse(dataBuffer: Buffer, options?: Options): Promise<Result>;
}
