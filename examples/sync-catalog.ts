import { Effect, Option } from 'effect';
import { AdminClientTag, adminClientLayer } from '../src/effect';
import { settingsFromEnv } from '../src/index';

// Walks the whole catalog the way a background sync job would:
// - Session is built lazily from SHOPIFY_* environment variables
// - Products are paged 250 at a time through the Link cursor
// - Each product's variants and metafields are read one request at a time

const program = Effect.gen(function* () {
  console.log('--- Catalog Sync Demo ---');

  const admin = yield* AdminClientTag;

  const session = yield* admin.getSession();
  if (Option.isNone(session)) {
    console.log('SHOPIFY_API_KEY / SHOPIFY_API_SECRET not set, nothing to do.');
    return;
  }
  console.log('Shop:', session.value.shop);

  const products = yield* admin.products.all({ status: 'active' });
  console.log(`Fetched ${products.length} products`);

  for (const product of products.slice(0, 3)) {
    const variants = yield* admin.variants.byProductId(product.id);
    const metafields = yield* admin.metafields.byProductId(product.id, {
      timeoutMs: 30_000,
    });
    console.log(
      `${product.title}: ${variants.length} variants, ${metafields.length} metafields`
    );
  }
});

Effect.runPromise(
  program.pipe(Effect.provide(adminClientLayer(settingsFromEnv())))
).catch((err) => {
  console.error('Catalog sync demo failed:', err);
});
