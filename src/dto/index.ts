export { DubOptionsDto, DubVideoDto, DubFileDto, SUBTITLE_MODES } from "./dub.dto"
export { DubbingResultDto, WorkflowFailureDto, WorkflowStatusDto, WorkflowProgressDto, StartWorkflowResponseDto, CancelWorkflowResponseDto, ErrorResponseDto } from "./dub-response.dto"
