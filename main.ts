/**
 * Trellis Application Entry Point
 *
 * Demo app: a guestbook form protected by sessions and CSRF tokens.
 */

import {
  Application,
  TrellisResponse,
  csrfExempt,
  getLogger,
  html,
  loadConfig,
  raw,
  type Context,
} from './framework/mod.ts';

// Forms must send the token as a field and as a header.
const SUBMIT_WITH_TOKEN = raw(`<script>
document.querySelector('form').addEventListener('submit', async (event) => {
  event.preventDefault();
  const form = event.target;
  const body = new URLSearchParams(new FormData(form));
  await fetch(form.action, { method: 'POST', body, headers: { 'X-CSRF-Token': body.get('csrf_token') } });
  location.reload();
});
</script>`);

function messages(ctx: Context): string[] {
  const stored = ctx.session?.get('messages');
  return Array.isArray(stored) ? stored.filter((m): m is string => typeof m === 'string') : [];
}

async function main(): Promise<void> {
  const config = await loadConfig();
  const app = new Application({ config: config.all() });

  app.get('/', (ctx) => {
    const page = html`<!doctype html>
<title>Guestbook</title>
<form method="post" action="/sign">
  ${ctx.csrf?.field() ?? ''}
  <input name="message">
  <button>Sign</button>
</form>
<ul>${messages(ctx).map((m) => html`<li>${m}</li>`)}</ul>
${SUBMIT_WITH_TOKEN}`;
    return new TrellisResponse().html(page);
  });

  app.post('/sign', async (ctx) => {
    const message = (await ctx.request.field('message'))?.trim();
    if (message) {
      ctx.session?.set('messages', [...messages(ctx), message]);
    }
    return new TrellisResponse().redirect('/', 303);
  });

  app.post(
    '/webhook',
    csrfExempt(async (ctx) => new TrellisResponse().json({ received: (await ctx.request.text()).length }))
  );

  app.get('/health', () => new TrellisResponse().json({ status: 'ok' }));

  await app.listen();

  const shutdown = (): void => {
    app.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        app.logger.error('Shutdown failed', error instanceof Error ? error : undefined);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  getLogger().error('Failed to start application', error instanceof Error ? error : undefined);
  process.exit(1);
});
