import { Env } from '../utils/sessionManager';
import { logger } from '../utils/logger';
import { sendDocumentNotification } from '../utils/email';
import { DocumentEvent, PublishedDocument, User } from '../types';
import { getDocument } from './documentService';
import { followersToNotify } from './followService';

export interface NotificationOutcome {
  sent: number;
  skipped: number;
  failed: number;
}

const truncate = (text: string): string => (text.length > 150 ? `${text.substring(0, 147)}...` : text);

/**
 * Emails followers of a document about an event that has already committed.
 * Delivery problems are logged and counted; they never reach the caller's
 * lifecycle operation.
 */
export async function notifyFollowers(
  documentIdentifier: string,
  event: DocumentEvent,
  env: Env
): Promise<NotificationOutcome> {
  const outcome: NotificationOutcome = { sent: 0, skipped: 0, failed: 0 };

  let document: PublishedDocument | null;
  let recipients: User[];
  try {
    document = getDocument(documentIdentifier, env);
    recipients = document
      ? followersToNotify(documentIdentifier, event.kind, env).filter(user => user.id !== event.actorId)
      : [];
  } catch (error) {
    logger.error(`Could not look up followers of ${documentIdentifier} for a ${event.kind} notification:`, error);
    return outcome;
  }

  if (!document) {
    logger.warn(`Cannot send notifications: document ${documentIdentifier} not found`);
    return outcome;
  }
  if (recipients.length === 0) {
    return outcome;
  }

  const { SESKey, SESSecret } = env;
  if (!SESKey || !SESSecret) {
    logger.warn(`Email service credentials not configured; ${recipients.length} notification(s) for ${documentIdentifier} not sent`);
    outcome.skipped = recipients.length;
    return outcome;
  }

  const documentUrl = `${env.PUBLIC_URL}/doc/${documentIdentifier}`;
  for (const recipient of recipients) {
    if (!recipient.email) {
      logger.debug(`Skipping notification for ${recipient.id}: no email on file`);
      outcome.skipped++;
      continue;
    }

    try {
      await sendDocumentNotification(
        recipient.email,
        document.identifier,
        document.title,
        event.kind,
        truncate(event.summary),
        documentUrl,
        SESKey,
        SESSecret,
        { from: env.EMAIL_FROM, region: env.SES_REGION }
      );
      outcome.sent++;
    } catch (error) {
      logger.error(`Error sending ${event.kind} notification to ${recipient.email}:`, error);
      outcome.failed++;
    }
  }

  logger.info(`Notifications for ${documentIdentifier} (${event.kind}): ${outcome.sent} sent, ${outcome.skipped} skipped, ${outcome.failed} failed`);
  return outcome;
}
