// Artifact output: file naming and the JSON file writer

export { JsonFileArtifactWriter } from './file-writer.js';
export { artifactFileName, compactTimestamp, safeFileComponent } from './naming.js';
