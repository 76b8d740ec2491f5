import { Resend } from "resend";
import { daysUntil, formatDate } from "./dates.js";
import { createLogger } from "./logger.js";
import type { IsoDate, Posting } from "./types.js";

const log = createLogger({ component: "notifier" });

export async function sendNotification(postings: Posting[], toEmail: string, today: IsoDate): Promise<void> {
  const apiKey = process.env.RESEND_API_KEY;
  if (!apiKey) {
    throw new Error("RESEND_API_KEY environment variable is required");
  }

  if (postings.length === 0) {
    log.info("No postings to notify about");
    return;
  }

  const resend = new Resend(apiKey);
  const plural = postings.length === 1 ? "" : "s";

  const rowsHtml = postings
    .map(
      (posting) => `
      <tr>
        <td style="padding: 12px; border-bottom: 1px solid #eee;">
          ${
            posting.link
              ? `<a href="${escapeHtml(posting.link)}" style="color: #0f766e; text-decoration: none; font-weight: 500;">${escapeHtml(posting.title)}</a>`
              : `<span style="font-weight: 500;">${escapeHtml(posting.title)}</span>`
          }
          <br><span style="color: #666; font-size: 14px;">${escapeHtml(posting.site)}</span>
          ${posting.deadline ? `<br><span style="color: #999; font-size: 12px;">${deadlineLabel(posting.deadline, today)}</span>` : ""}
        </td>
      </tr>
    `
    )
    .join("");

  const html = `
    <!DOCTYPE html>
    <html>
    <head>
      <meta charset="utf-8">
      <meta name="viewport" content="width=device-width, initial-scale=1">
    </head>
    <body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; margin: 0; padding: 20px; background: #f5f5f5;">
      <div style="max-width: 600px; margin: 0 auto; background: white; border-radius: 8px; overflow: hidden; box-shadow: 0 1px 3px rgba(0,0,0,0.1);">
        <div style="background: #0f766e; color: white; padding: 20px;">
          <h1 style="margin: 0; font-size: 20px;">Nuevas ofertas de empleo en IIS</h1>
          <p style="margin: 8px 0 0; opacity: 0.9; font-size: 14px;">${postings.length} oferta${plural} nueva${plural}</p>
        </div>
        <table style="width: 100%; border-collapse: collapse;">
          ${rowsHtml}
        </table>
      </div>
    </body>
    </html>
  `;

  const text = postings
    .map((posting) => {
      const deadline = posting.deadline ? `\n${deadlineLabel(posting.deadline, today)}` : "";
      return `${posting.site} - ${posting.title}${deadline}${posting.link ? `\n${posting.link}` : ""}`;
    })
    .join("\n\n");

  log.info({ count: postings.length, to: toEmail }, "Sending notification");

  const { error } = await resend.emails.send({
    from: "Alertas Empleo IIS <onboarding@resend.dev>",
    to: toEmail,
    subject: `${postings.length} nueva${plural} oferta${plural} de empleo en IIS`,
    html,
    text,
  });

  if (error) {
    throw new Error(`Failed to send email: ${error.message}`);
  }

  log.info("Notification sent");
}

function deadlineLabel(deadline: IsoDate, today: IsoDate): string {
  const days = daysUntil(deadline, today);
  const left = days === 0 ? "cierra hoy" : `${days} día${days === 1 ? "" : "s"}`;
  return `Plazo: ${formatDate(deadline)} (${left})`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
