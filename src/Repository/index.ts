export { ProjectFileRepository } from './ProjectFileRepository.js';
export { ProjectIndex, RecordFilename } from './ProjectIndex.js';
