// public api for @photoflow/sdk
// usage:
//   import { connectTaskClient } from '@photoflow/sdk';
//   const client = connectTaskClient('localhost:50051');
//   const taskId = await client.submitTask({ sku_code: 'SKU-1', metadata: { ... } });

export {
    TaskStatus,
    WORKFLOW_STEP,
    TERMINAL_STATUSES,
    isTerminal,
    isTaskStatus,
} from './types';
export type {
    PhotoTask,
    TaskMetadata,
    Adjustments,
    PhotoStepStatus,
    ColorAnalysisEntry,
    PublishResultEntry,
    AgentLogEntry,
    ErrorKind,
    RetryMetadata,
    SubmitTaskInput,
} from './types';

export { serialize, deserialize, encodeTask, decodeTask, SerializationError } from './utils/serialization';

export {
    PROTO_DIR,
    PROTO_OPTIONS,
    createTaskClient,
    connectTaskClient,
    loadService,
} from './grpc-client';
export type {
    TaskClient,
    TaskQuery,
    TaskServiceStub,
    SubmitTaskRequest,
    GetTaskRequest,
} from './grpc-client';
