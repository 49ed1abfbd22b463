export { JMAPClient } from "./client.js";
export type {
  DraftAttachment,
  DraftRequest,
  Email,
  EmailAddress,
  EmailBodyPart,
  EmailQueryFilter,
  Identity,
  Mailbox,
} from "./types.js";
