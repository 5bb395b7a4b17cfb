export interface TextGenerator {
  generate(prompt: string, documents?: string[]): Promise<string>;
}

export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}
