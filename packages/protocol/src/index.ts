export {
  RELAY_FRAME_BYTES,
  RelayFrameKindSchema,
  encodeLoginFrame,
  parseRelayFrame,
  type RelayFrame,
  type RelayFrameKind,
} from './frames';

export {
  DeviceRegisterResponseSchema,
  LoginResponseSchema,
  MessagesResponseSchema,
  PRIORITIES,
  PrioritySchema,
  RawMessageSchema,
  StatusResponseSchema,
  priorityFromRelay,
  type DeviceRegisterResponse,
  type LoginResponse,
  type MessagesResponse,
  type Priority,
  type RawMessage,
  type StatusResponse,
} from './messages';
