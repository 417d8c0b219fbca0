/**
 * Web Server
 *
 * Fastify server for the business website: static pages, the feedback and
 * order forms, and the admin password rotation endpoint.
 * The feedback form is CSRF protected (double submit cookie); the order endpoint is exempt.
 * Form submissions are relayed to the admin chat through the notification bot.
 */

import Fastify, { FastifyError, FastifyInstance, FastifyReply } from 'fastify';
import fastifyStatic from '@fastify/static';
import fastifyFormbody from '@fastify/formbody';
import fastifyCookie from '@fastify/cookie';
import fastifyCsrf from '@fastify/csrf-protection';
import path from 'path';
import { fileURLToPath } from 'url';
import { logger } from '../logger.js';
import { ValidationError, errorMessage } from '../errors.js';
import { secureCompare } from '../secureCompare.js';
import {
  FORM_ERRORS,
  buildFeedbackMessage,
  buildOrderMessage,
  normalizePhone,
  validateFeedback,
  validateOrder,
} from '../forms/index.js';
import type { FeedbackForm, OrderRequest } from '../forms/index.js';
import { RateLimiter } from './RateLimiter.js';
import type { AdminResponse, ErrorBody, NotificationGateway, WebServerConfig } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** Files served at fixed URLs from the public directory */
const PAGES: Record<string, string> = {
  '/': 'index.html',
  '/about': 'about.html',
  '/products': 'products.html',
  '/contacts': 'contacts.html',
  '/privacy-policy': 'privacy-policy.html',
  '/feedback_content': 'feedback-content.html',
  '/favicon.ico': 'favicon.ico',
};

export const PAGE_TEXT = {
  feedbackSuccess: 'Thank you! Your request has been received. We will contact you shortly.',
  feedbackError: 'Something went wrong while sending your request. Please try again later.',
  passwordUpdated: 'Password updated. All recipients have been deauthorized.',
} as const;

const orderBodySchema = {
  type: 'object',
  required: ['order'],
  properties: {
    name: { type: 'string' },
    phone: { type: 'string' },
    comment: { type: 'string' },
    order: {
      type: 'object',
      required: ['items', 'total'],
      properties: {
        items: {
          type: 'array',
          items: {
            type: 'object',
            required: ['name', 'quantity', 'unit', 'pricePerUnit', 'price'],
            properties: {
              name: { type: 'string' },
              quantity: { type: ['number', 'string'] },
              unit: { type: 'string' },
              pricePerUnit: { type: ['number', 'string'] },
              price: { type: ['number', 'string'] },
            },
          },
        },
        total: { type: ['number', 'string'] },
      },
    },
  },
} as const;

type FormBody = Record<string, unknown> | null | undefined;

/**
 * Single form field as a trimmed string; repeated fields use the first value
 */
function readField(body: FormBody, key: string): string {
  const value = body?.[key];
  const first: unknown = Array.isArray(value) ? value[0] : value;
  if (typeof first === 'string') {
    return first.trim();
  }
  if (typeof first === 'number') {
    return String(first);
  }
  return '';
}

function hasConsent(body: FormBody): boolean {
  const value = body?.privacy;
  if (typeof value === 'boolean') {
    return value;
  }
  return readField(body, 'privacy') !== '';
}

function readNewPassword(body: unknown): string | null {
  if (
    body &&
    typeof body === 'object' &&
    'new_password' in body &&
    typeof body.new_password === 'string'
  ) {
    return body.new_password;
  }
  return null;
}

export class WebServer {
  private server: FastifyInstance;
  private config: WebServerConfig;
  private gateway: NotificationGateway;
  private rateLimiter: RateLimiter;
  private now: () => Date;
  private built = false;
  private pruneTimer: NodeJS.Timeout | null = null;
  private startTime: number = Date.now();

  private get uptime(): number {
    return Date.now() - this.startTime;
  }

  constructor(config: WebServerConfig, gateway: NotificationGateway, now: () => Date = () => new Date()) {
    this.config = config;
    this.gateway = gateway;
    this.now = now;
    this.server = Fastify({ logger: false });
    this.rateLimiter = new RateLimiter(config.rateLimit);

    if (!config.adminApiKey) {
      logger.warn('ADMIN_API_KEY is not set, admin endpoints will reject every request');
    }
  }

  /**
   * Register plugins and routes. Safe to call more than once.
   */
  async build(): Promise<FastifyInstance> {
    if (this.built) {
      return this.server;
    }
    this.built = true;

    await this.registerPlugins();
    this.registerErrorHandler();
    this.registerPageRoutes();
    this.registerFormRoutes();
    this.registerAdminRoutes();

    await this.server.ready();
    return this.server;
  }

  /**
   * Build and start listening
   */
  async start(): Promise<void> {
    await this.build();

    try {
      await this.server.listen({
        port: this.config.port,
        host: this.config.host,
      });
      // Forget idle clients once per window
      this.pruneTimer = setInterval(() => this.rateLimiter.prune(), this.config.rateLimit.windowMs);
      this.pruneTimer.unref();

      logger.info('Web server started', {
        url: `http://${this.config.host}:${this.config.port}`,
      });
    } catch (error) {
      logger.error('Failed to start web server', { error: errorMessage(error) });
      throw error;
    }
  }

  async stop(): Promise<void> {
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = null;
    }
    await this.server.close();
    logger.info('Web server stopped');
  }

  private async registerPlugins(): Promise<void> {
    // Static file serving
    await this.server.register(fastifyStatic, {
      root: this.config.publicDir ?? path.join(__dirname, '../../public'),
      prefix: '/static/',
    });

    // application/x-www-form-urlencoded bodies for the feedback form
    await this.server.register(fastifyFormbody);

    // CSRF secret lives in a cookie, the token comes back in the form or a header
    await this.server.register(fastifyCookie);
    await this.server.register(fastifyCsrf, { sessionPlugin: '@fastify/cookie' });
  }

  private registerErrorHandler(): void {
    this.server.setErrorHandler((error: FastifyError, request, reply) => {
      if (error.validation) {
        logger.debug('Request failed schema validation', {
          url: request.url,
          error: error.message,
        });
        reply.code(400).send({ error: FORM_ERRORS.invalidPayload });
        return;
      }

      const statusCode = error.statusCode ?? 500;
      if (statusCode === 403) {
        logger.warn('Request failed CSRF check', { url: request.url, ip: request.ip });
        reply.code(403).send({ error: FORM_ERRORS.csrfInvalid });
        return;
      }
      if (statusCode < 500) {
        reply.code(statusCode).send({ error: error.message });
        return;
      }

      logger.error('Unhandled request error', { url: request.url, error: error.message });
      reply.code(500).send({ error: FORM_ERRORS.internal });
    });
  }

  private registerPageRoutes(): void {
    for (const [url, file] of Object.entries(PAGES)) {
      this.server.get(url, async (_request, reply) => reply.sendFile(file));
    }

    this.server.get('/feedback-success', async () => PAGE_TEXT.feedbackSuccess);
    this.server.get('/feedback-error', async () => PAGE_TEXT.feedbackError);

    // Token for the feedback form; also sets the secret cookie
    this.server.get('/csrf-token', async (_request, reply) => {
      return { token: reply.generateCsrf() };
    });

    // Health check
    this.server.get('/api/health', async () => {
      return {
        status: 'ok',
        uptime: this.uptime,
        recipients: this.gateway.getStatus().recipients,
      };
    });
  }

  private registerFormRoutes(): void {
    this.server.post<{ Body: FormBody }>(
      '/submit-feedback',
      { preHandler: this.server.csrfProtection },
      async (request, reply) => {
        if (!this.rateLimiter.check(request.ip).allowed) {
          logger.warn('Feedback rate limit exceeded', { ip: request.ip });
          return this.fail(reply, 429, FORM_ERRORS.rateLimit);
        }

        if (!hasConsent(request.body)) {
          return this.fail(reply, 400, FORM_ERRORS.privacyRequired);
        }

        const form: FeedbackForm = {
          firstname: readField(request.body, 'firstname'),
          lastname: readField(request.body, 'lastname'),
          patronymic: readField(request.body, 'patronymic'),
          phone: normalizePhone(readField(request.body, 'phone')),
          message: readField(request.body, 'message'),
        };

        const errors = validateFeedback(form);
        if (errors.length > 0) {
          return this.fail(reply, 400, errors.join(' '));
        }

        const sent = await this.relay('feedback', () =>
          buildFeedbackMessage(form, this.now(), this.config.timeZone)
        );
        if (!sent) {
          return this.fail(reply, 500, FORM_ERRORS.submitFailed);
        }
        return { success: true };
      }
    );

    this.server.post<{ Body: OrderRequest }>(
      '/submit-order',
      { schema: { body: orderBodySchema } },
      async (request, reply) => {
        if (!this.rateLimiter.check(request.ip).allowed) {
          logger.warn('Order rate limit exceeded', { ip: request.ip });
          return this.fail(reply, 429, FORM_ERRORS.rateLimit);
        }

        const problem = validateOrder(request.body);
        if (problem !== null) {
          return this.fail(reply, 400, problem);
        }

        const sent = await this.relay('order', () =>
          buildOrderMessage(request.body, this.now(), this.config.timeZone)
        );
        if (!sent) {
          return this.fail(reply, 500, FORM_ERRORS.orderSubmitFailed);
        }
        return { success: true };
      }
    );
  }

  private registerAdminRoutes(): void {
    this.server.post('/admin/update-password', async (request, reply) => {
      const key = this.config.adminApiKey;
      const header = request.headers.authorization;
      if (!key || header === undefined || !secureCompare(header, key)) {
        logger.warn('Unauthorized admin request', { ip: request.ip });
        return this.adminError(reply, 401, 'Unauthorized');
      }

      const newPassword = readNewPassword(request.body);
      if (newPassword === null) {
        return this.adminError(reply, 400, FORM_ERRORS.invalidPayload);
      }

      try {
        this.gateway.updatePassword(newPassword);
        const response: AdminResponse = { status: 'success', message: PAGE_TEXT.passwordUpdated };
        return response;
      } catch (error) {
        return this.adminError(reply, error instanceof ValidationError ? 400 : 500, errorMessage(error));
      }
    });
  }

  /**
   * Build the notification text and hand it to the bot
   */
  private async relay(kind: 'feedback' | 'order', build: () => string): Promise<boolean> {
    try {
      const sent = await this.gateway.sendMessage(build());
      if (sent) {
        logger.info('Form relayed to admin chat', { kind });
      } else {
        logger.error('Form could not be relayed to admin chat', { kind });
      }
      return sent;
    } catch (error) {
      logger.error('Error while relaying form', { kind, error: errorMessage(error) });
      return false;
    }
  }

  private fail(reply: FastifyReply, statusCode: number, message: string): ErrorBody {
    reply.code(statusCode);
    return { error: message };
  }

  private adminError(reply: FastifyReply, statusCode: number, message: string): AdminResponse {
    reply.code(statusCode);
    return { status: 'error', message };
  }

  get instance(): FastifyInstance {
    return this.server;
  }
}
