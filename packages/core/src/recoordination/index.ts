export { RecoordinationPipeline } from './RecoordinationPipeline';
export type {
  RecoordinationRequest,
  RecoordinationFileRequest,
  RecoordinationResult,
  RecoordinationFileResult,
  RecoordinationPipelineOptions,
} from './RecoordinationPipeline';
