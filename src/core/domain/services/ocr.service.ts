export interface IOcrEngine {
  recognize(image: Buffer): Promise<string>;
  terminate(): Promise<void>;
}
