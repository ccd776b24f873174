/** The parts of a multer in-memory file the upload route reads. */
export interface UploadedEditorFile {
  originalname: string;
  size: number;
  buffer: Buffer;
}

export interface UploadResponseLike {
  readonly writableFinished: boolean;
  status(code: number): unknown;
  setHeader(name: string, value: string): unknown;
  once(event: 'close', listener: () => void): unknown;
}
