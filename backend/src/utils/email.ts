import { AwsClient } from "aws4fetch";
import { DocumentEventKind } from "../types";
import { logger } from "./logger";

export interface EmailSender {
	from: string;
	region: string;
}

const DEFAULT_SENDER: EmailSender = {
	from: 'Policy Docket <noreply@localhost>',
	region: 'us-east-1',
};

const escapeHtml = (text: string): string =>
	text
		.replace(/&/g, '&amp;')
		.replace(/</g, '&lt;')
		.replace(/>/g, '&gt;')
		.replace(/"/g, '&quot;');

export async function sendEmail(
	toEmail: string,
	subjectLine: string,
	message: string,
	IAM_ACCESS_KEY: string,
	IAM_ACCESS_KEY_SECRET: string,
	sender: EmailSender = DEFAULT_SENDER): Promise<number> {
	const aws: AwsClient = new AwsClient({ accessKeyId: IAM_ACCESS_KEY, secretAccessKey: IAM_ACCESS_KEY_SECRET });
	const resp = await aws.fetch(`https://email.${sender.region}.amazonaws.com/v2/email/outbound-emails`, {
		method: 'POST',
		headers: {
			'content-type': 'application/json',
		},
		body: JSON.stringify({
			Destination:
			{
				ToAddresses: [ toEmail ],
			},
			FromEmailAddress: sender.from,
			Content: {
				Simple: {
					Subject: {
						Data: subjectLine
					},
					Body: {
						Text: {
							Data: message,
						},
						Html: {
							Data: `
							<body>
								<div align="center" style="font-family:Calibri, Arial, Helvetica, sans-serif;">
									<table width="600" cellpadding="0" cellspacing="0" border="0">
									<tr><td>
									<h1>Policy Docket</h1>
									<p>` + escapeHtml(message).replace(/\n/g, '<br>') + `</p>
									</td></tr></table></div></body>`,
						}
					}
				},
			},
		}),
	});

	const respText: unknown = await resp.json();
	logger.debug(resp.status + " " + resp.statusText, respText);
	if (resp.status != 200 && resp.status != 201) {
		throw new Error('Error sending email: ' + resp.status + " " + resp.statusText + " " + JSON.stringify(respText));
	}
	return resp.status;
}

const EVENT_DESCRIPTIONS: Record<DocumentEventKind, string> = {
	comment: 'A new comment was posted',
	significant: 'A new revision was published',
	major: 'The document status changed',
};

// Notifies a follower about activity on a document they follow
export async function sendDocumentNotification(
	toEmail: string,
	documentIdentifier: string,
	documentTitle: string,
	eventKind: DocumentEventKind,
	summary: string,
	documentUrl: string,
	IAM_ACCESS_KEY: string,
	IAM_ACCESS_KEY_SECRET: string,
	sender: EmailSender = DEFAULT_SENDER
): Promise<number> {
	const subject = `[${documentIdentifier}] ${EVENT_DESCRIPTIONS[eventKind]}`;

	const message = `Hello,

${EVENT_DESCRIPTIONS[eventKind]} on ${documentIdentifier} "${documentTitle}".

${summary}

View the document:
${documentUrl}

You are receiving this because you follow ${documentIdentifier}. You can change your notification level on the document page.

Policy Docket`;

	return await sendEmail(toEmail, subject, message, IAM_ACCESS_KEY, IAM_ACCESS_KEY_SECRET, sender);
}
