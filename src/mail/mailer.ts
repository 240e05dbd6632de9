import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type { MailConfig } from '../types/index.js';
import type { RenderedDigest } from '../digest/render.js';
import { ConfigError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface MailAddresses {
    from: string;
    to: string;
}

/**
 * The part of a nodemailer transporter the mailer uses (SMTP in production, JSON in tests).
 */
export interface MailTransport {
    sendMail(options: SendMailOptions): Promise<{ messageId: string }>;
}

/**
 * multipart/alternative message carrying both digest bodies.
 */
export function buildMailOptions(digest: RenderedDigest, addresses: MailAddresses): SendMailOptions {
    return {
        from: addresses.from,
        to: addresses.to,
        subject: digest.subject,
        text: digest.text,
        html: digest.html,
    };
}

/**
 * Sends rendered digests through a nodemailer transport.
 */
export class DigestMailer {
    constructor(
        private readonly transport: MailTransport,
        private readonly addresses: MailAddresses
    ) {}

    /**
     * @returns The Message-ID assigned to the sent mail
     */
    async send(digest: RenderedDigest): Promise<string> {
        const logger = getLogger();
        logger.info({ to: this.addresses.to, subject: digest.subject }, 'Sending digest');

        const info = await this.transport.sendMail(buildMailOptions(digest, this.addresses));

        logger.info({ to: this.addresses.to, messageId: info.messageId }, 'Digest sent');
        return info.messageId;
    }
}

/**
 * SMTP mailer (Gmail by default: port 587 with STARTTLS and an app password).
 */
export function createSmtpMailer(config: MailConfig, password: string): DigestMailer {
    if (!config.user) {
        throw new ConfigError('SMTP user is not configured (set SMTP_USER)');
    }

    const transport = nodemailer.createTransport({
        host: config.host,
        port: config.port,
        secure: config.secure,
        requireTLS: !config.secure,
        auth: { user: config.user, pass: password },
    });

    const from = config.from ?? config.user;
    return new DigestMailer(transport, { from, to: config.to ?? from });
}
