/**
 * Response module public API.
 */
export {
  DELIVERED_STATUS,
  interpretReply,
  parseReasonBody,
} from "./transform.js";
