export * from './CharacterTextSplitter';
export * from './DocumentCollection';
export * from './DocumentLoader';
export * from './HashingEmbeddingProvider';
export * from './InMemoryVectorStore';
