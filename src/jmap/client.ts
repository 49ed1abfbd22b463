import type {
  DraftRequest,
  Email,
  EmailQueryFilter,
  Identity,
  JMAPMethodCall,
  JMAPRequest,
  JMAPResponse,
  JMAPSession,
  Mailbox,
  UploadResponse,
} from "./types.js";

const USING = [
  "urn:ietf:params:jmap:core",
  "urn:ietf:params:jmap:mail",
  "urn:ietf:params:jmap:submission",
];

export class JMAPClient {
  private session: JMAPSession | null = null;
  private accountId: string | null = null;
  private mailboxCache: Mailbox[] | null = null;

  constructor(
    private readonly sessionUrl: string,
    private readonly token: string
  ) {}

  private async fetch<T>(url: string, options: RequestInit = {}): Promise<T> {
    const response = await fetch(url, {
      ...options,
      headers: {
        Authorization: `Bearer ${this.token}`,
        "Content-Type": "application/json",
        ...options.headers,
      },
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`JMAP request failed: ${response.status} ${text}`);
    }

    return response.json() as Promise<T>;
  }

  async connect(): Promise<void> {
    this.session = await this.fetch<JMAPSession>(this.sessionUrl);
    this.accountId = this.session.primaryAccounts["urn:ietf:params:jmap:mail"] ?? null;

    if (!this.accountId) {
      throw new Error("No mail account found in JMAP session");
    }

    console.log(`[JMAP] Connected as ${this.session.username}`);
  }

  private requireSession(): { session: JMAPSession; accountId: string } {
    if (!this.session || !this.accountId) {
      throw new Error("Not connected. Call connect() first.");
    }
    return { session: this.session, accountId: this.accountId };
  }

  /**
   * Run one method call and return its arguments, throwing on a JMAP
   * "error" response.
   */
  private async call<T>(method: string, args: Record<string, unknown>): Promise<T> {
    const { session, accountId } = this.requireSession();
    const methodCalls: JMAPMethodCall[] = [[method, { accountId, ...args }, "0"]];
    const request: JMAPRequest = { using: USING, methodCalls };

    const response = await this.fetch<JMAPResponse>(session.apiUrl, {
      method: "POST",
      body: JSON.stringify(request),
    });

    const [name, result] = response.methodResponses[0];
    if (name === "error") {
      throw new Error(`${method} failed: ${JSON.stringify(result)}`);
    }

    return result as T;
  }

  // ============ Mailboxes ============

  async getMailboxes(): Promise<Mailbox[]> {
    if (!this.mailboxCache) {
      const { list } = await this.call<{ list: Mailbox[] }>("Mailbox/get", {});
      this.mailboxCache = list;
    }
    return this.mailboxCache;
  }

  async findMailboxByRole(role: string): Promise<Mailbox | undefined> {
    const mailboxes = await this.getMailboxes();
    return mailboxes.find((m) => m.role === role);
  }

  async findMailboxByName(name: string): Promise<Mailbox | undefined> {
    const mailboxes = await this.getMailboxes();
    return mailboxes.find((m) => m.name.toLowerCase() === name.toLowerCase());
  }

  // ============ Reading mail ============

  async queryEmails(
    filter: EmailQueryFilter,
    options: { limit?: number; ascending?: boolean } = {}
  ): Promise<string[]> {
    const { ids } = await this.call<{ ids: string[] }>("Email/query", {
      filter,
      sort: [{ property: "receivedAt", isAscending: options.ascending ?? false }],
      limit: options.limit ?? 50,
    });
    return ids;
  }

  async getEmailBody(id: string): Promise<Email> {
    const { list } = await this.call<{ list: Email[] }>("Email/get", {
      ids: [id],
      properties: [
        "id",
        "from",
        "to",
        "subject",
        "receivedAt",
        "preview",
        "keywords",
        "bodyValues",
        "textBody",
        "htmlBody",
      ],
      fetchTextBodyValues: true,
      fetchHTMLBodyValues: true,
    });

    if (list.length === 0) {
      throw new Error(`Email not found: ${id}`);
    }

    return list[0];
  }

  async addEmailKeyword(emailId: string, keyword: string): Promise<void> {
    const result = await this.call<{ notUpdated?: Record<string, unknown> }>("Email/set", {
      update: { [emailId]: { [`keywords/${keyword}`]: true } },
    });

    if (result.notUpdated?.[emailId]) {
      throw new Error(`Failed to tag email: ${JSON.stringify(result.notUpdated[emailId])}`);
    }
  }

  // ============ Sending ============

  async uploadBlob(content: string, type: string): Promise<string> {
    const { session, accountId } = this.requireSession();
    const url = session.uploadUrl.replace("{accountId}", encodeURIComponent(accountId));

    const upload = await this.fetch<UploadResponse>(url, {
      method: "POST",
      headers: { "Content-Type": type },
      body: content,
    });

    console.log(`[JMAP] Uploaded blob ${upload.blobId} (${upload.size} bytes)`);
    return upload.blobId;
  }

  async createDraft(email: DraftRequest): Promise<string> {
    const drafts = await this.findMailboxByRole("drafts");
    if (!drafts) {
      throw new Error("Drafts mailbox not found");
    }

    const bodyValues: Record<string, { value: string }> = {
      text: { value: email.textBody },
    };
    if (email.htmlBody) {
      bodyValues.html = { value: email.htmlBody };
    }

    const result = await this.call<{
      created?: Record<string, { id: string }>;
      notCreated?: Record<string, unknown>;
    }>("Email/set", {
      create: {
        draft: {
          mailboxIds: { [drafts.id]: true },
          keywords: { $draft: true, $seen: true },
          to: email.to.map((a) => ({ name: a.name ?? null, email: a.email })),
          subject: email.subject,
          textBody: [{ partId: "text", type: "text/plain" }],
          ...(email.htmlBody ? { htmlBody: [{ partId: "html", type: "text/html" }] } : {}),
          ...(email.attachments?.length
            ? {
                attachments: email.attachments.map((a) => ({
                  blobId: a.blobId,
                  type: a.type,
                  name: a.name,
                  disposition: "attachment",
                })),
              }
            : {}),
          bodyValues,
        },
      },
    });

    const draft = result.created?.draft;
    if (!draft) {
      throw new Error(`Failed to create draft: ${JSON.stringify(result.notCreated ?? {})}`);
    }

    return draft.id;
  }

  async sendEmail(draftId: string): Promise<string> {
    const identities = await this.getIdentities();
    if (identities.length === 0) {
      throw new Error("No sending identity found");
    }

    const result = await this.call<{
      created?: Record<string, { id: string }>;
      notCreated?: Record<string, unknown>;
    }>("EmailSubmission/set", {
      create: {
        submission: { identityId: identities[0].id, emailId: draftId },
      },
      // Remove the draft once it has been submitted
      onSuccessDestroyEmail: ["#submission"],
    });

    const submission = result.created?.submission;
    if (!submission) {
      throw new Error(`EmailSubmission/set failed: ${JSON.stringify(result.notCreated ?? {})}`);
    }

    console.log(`[JMAP] Submission created with ID: ${submission.id}`);
    return submission.id;
  }

  async getIdentities(): Promise<Identity[]> {
    const { list } = await this.call<{ list: Identity[] }>("Identity/get", {});
    return list;
  }
}
