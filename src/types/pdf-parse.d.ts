// pdf-parse's package entry runs a self-test when loaded without a parent module
declare module 'pdf-parse/lib/pdf-parse.js' {
  import type { Options, Result } from 'pdf-parse';
  function pdfParse(dataBuffer: Buffer, options?: Options): Promise<Result>;
  export default pdfParse;
}
