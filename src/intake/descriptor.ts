import type { ContentDescriptor } from "../extraction/index.js";
import type { Email, EmailBodyPart } from "../jmap/index.js";

function partsText(email: Email, parts: EmailBodyPart[] | undefined): string {
  if (!parts || !email.bodyValues) return "";
  return parts
    .map((part) => (part.partId ? email.bodyValues?.[part.partId]?.value ?? "" : ""))
    .filter((value) => value.length > 0)
    .join("\n\n");
}

/**
 * Map a fetched JMAP email (with body values) to the extraction input.
 */
export function descriptorFromEmail(email: Email): ContentDescriptor {
  const sender = email.from?.[0];
  const from = sender
    ? sender.name
      ? `${sender.name} <${sender.email}>`
      : sender.email
    : "";

  const html = partsText(
    email,
    email.htmlBody?.filter((part) => part.type === "text/html")
  );

  return {
    text: partsText(email, email.textBody?.filter((part) => part.type === "text/plain")),
    html,
    subject: email.subject ?? "",
    from,
  };
}
