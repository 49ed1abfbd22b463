import type { JMAPClient } from "../jmap/index.js";

export interface OutgoingChunk {
  to: string;
  subject: string;
  textBody: string;
  attachment: {
    fileName: string;
    contentType: string;
    content: string;
  };
}

/**
 * The outbound "send" capability delivery depends on. Returns a provider
 * message or submission id.
 */
export interface ChunkSender {
  send(message: OutgoingChunk): Promise<string>;
}

/**
 * Sends chunks as mail attachments from the JMAP account.
 */
export class JmapChunkSender implements ChunkSender {
  constructor(private readonly jmap: JMAPClient) {}

  async send(message: OutgoingChunk): Promise<string> {
    const { attachment } = message;
    const blobId = await this.jmap.uploadBlob(attachment.content, attachment.contentType);

    const draftId = await this.jmap.createDraft({
      to: [{ email: message.to }],
      subject: message.subject,
      textBody: message.textBody,
      attachments: [{ blobId, type: attachment.contentType, name: attachment.fileName }],
    });

    return this.jmap.sendEmail(draftId);
  }
}
