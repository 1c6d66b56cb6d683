export interface Passage {
  content: string;
  source?: string;
  score?: number;
}

export interface ContextRetriever {
  retrieve(topic: string): AsyncIterable<Passage>;
}
