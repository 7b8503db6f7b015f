import { randomUUID } from 'node:crypto';
import request from 'supertest';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Test as NestTest, TestingModule } from '@nestjs/testing';
import * as jwt from 'jsonwebtoken';
import type { MemberRole } from '@shared/order';
import type { CatalogMenuItem } from '@shared/pricing';
import { AppModule } from '../src/app.module';
import { configureApp, getApiPrefix } from '../src/app.bootstrap';
import { CatalogRepository } from '../src/catalog/catalog.repository';
import type { ApiEnvelope } from '../src/common/interceptors/api-response.interceptor';
import {
  ORDERING_CONFIG,
  loadOrderingConfig,
} from '../src/config/ordering.config';
import { DatabaseService } from '../src/database/database.service';
import { StaffDevicesRepository } from '../src/notifications/staff-devices.repository';
import { DailyCounterRepository } from '../src/orders/daily-counter.repository';
import { OrdersRepository } from '../src/orders/orders.repository';
import type { Order, OrderHeader, OrderItem } from '../src/orders/types';
import {
  PAYMENT_GATEWAY,
  PaymentGatewayError,
  type AuthorizePaymentParams,
  type PaymentAuthorization,
  type PaymentGateway,
  type PaymentIntentSummary,
} from '../src/payments/payment-gateway';
import { RateLimitRepository } from '../src/rate-limit/rate-limit.repository';
import {
  TenantsRepository,
  type MembershipRecord,
  type ProfileRecord,
  type TenantRecord,
} from '../src/tenants/tenants.repository';

const JWT_SECRET = 'test-secret';

const TENANT_ID = '0b6f1d8e-3f7a-4c11-9a53-0d2c1e7f4a10';
const OTHER_TENANT_ID = '6c0e2b7d-9a14-4e3f-8d21-5b7a9c3e1f02';
const CUSTOMER_ID = '8f3e1a2b-4c5d-4e6f-9a0b-1c2d3e4f5a6b';
const MANAGER_ID = '1a2b3c4d-5e6f-4a7b-8c9d-0e1f2a3b4c5d';
const MARGHERITA_ID = 'a1111111-1111-4111-8111-111111111111';
const DIAVOLA_ID = 'a2222222-2222-4222-8222-222222222222';
const FOREIGN_ITEM_ID = 'b3333333-3333-4333-8333-333333333333';

type Envelope<T = Record<string, unknown>> = ApiEnvelope<T>;

class InMemoryTenantsRepository
  implements
    Pick<
      TenantsRepository,
      | 'findProfile'
      | 'findTenant'
      | 'findMembership'
      | 'findFirstActiveMembership'
      | 'createMembership'
    >
{
  private tenants: TenantRecord[] = [];
  private profiles: ProfileRecord[] = [];
  memberships: MembershipRecord[] = [];

  reset(): void {
    this.tenants = [
      { id: TENANT_ID, name: 'Da Mario', isActive: true },
      { id: OTHER_TENANT_ID, name: 'Da Luigi', isActive: true },
    ];
    this.profiles = [
      { id: CUSTOMER_ID, currentTenantId: TENANT_ID, legacyRole: null },
      { id: MANAGER_ID, currentTenantId: TENANT_ID, legacyRole: 'manager' },
    ];
    this.memberships = [
      {
        tenantId: TENANT_ID,
        userId: MANAGER_ID,
        role: 'manager',
        isActive: true,
        acceptedAt: new Date('2026-01-01T00:00:00Z'),
      },
    ];
  }

  findProfile(userId: string) {
    return Promise.resolve(this.profiles.find((p) => p.id === userId) ?? null);
  }

  findTenant(tenantId: string) {
    return Promise.resolve(this.tenants.find((t) => t.id === tenantId) ?? null);
  }

  findMembership(tenantId: string, userId: string) {
    return Promise.resolve(
      this.memberships.find(
        (m) => m.tenantId === tenantId && m.userId === userId,
      ) ?? null,
    );
  }

  findFirstActiveMembership(userId: string) {
    return Promise.resolve(
      this.memberships.find((m) => m.userId === userId && m.isActive) ?? null,
    );
  }

  createMembership(input: { tenantId: string; userId: string; role: MemberRole }) {
    const membership: MembershipRecord = {
      ...input,
      isActive: true,
      acceptedAt: new Date(),
    };
    this.memberships.push(membership);
    return Promise.resolve(membership);
  }
}

class InMemoryCatalogRepository
  implements
    Pick<
      CatalogRepository,
      | 'findMenuItems'
      | 'findSizes'
      | 'findSizeAssignments'
      | 'findIngredients'
      | 'findIngredientSizePrices'
    >
{
  private readonly menu = new Map<string, Array<CatalogMenuItem>>([
    [
      TENANT_ID,
      [
        { id: MARGHERITA_ID, basePrice: 6, discountedPrice: null },
        { id: DIAVOLA_ID, basePrice: 7.5, discountedPrice: 7 },
      ],
    ],
    [OTHER_TENANT_ID, [{ id: FOREIGN_ITEM_ID, basePrice: 5, discountedPrice: null }]],
  ]);

  findMenuItems(tenantId: string, ids: readonly string[]) {
    return Promise.resolve(
      (this.menu.get(tenantId) ?? []).filter((item) => ids.includes(item.id)),
    );
  }

  findSizes() {
    return Promise.resolve([]);
  }

  findSizeAssignments() {
    return Promise.resolve([]);
  }

  findIngredients() {
    return Promise.resolve([]);
  }

  findIngredientSizePrices() {
    return Promise.resolve([]);
  }
}

class InMemoryRateLimitRepository
  implements Pick<RateLimitRepository, 'consume' | 'pruneEndedBefore'>
{
  private counts = new Map<string, number>();

  reset(): void {
    this.counts = new Map();
  }

  consume(
    identifier: string,
    endpoint: string,
    windowStart: Date,
    _windowEnd: Date,
    maxRequests: number,
  ) {
    const key = `${identifier}/${endpoint}/${windowStart.toISOString()}`;
    const current = this.counts.get(key) ?? 0;
    if (current >= maxRequests) return Promise.resolve(null);
    this.counts.set(key, current + 1);
    return Promise.resolve(current + 1);
  }

  pruneEndedBefore() {
    return Promise.resolve(0);
  }
}

class InMemoryCounterRepository
  implements Pick<DailyCounterRepository, 'increment' | 'insertFirst'>
{
  private rows = new Map<string, number>();

  reset(): void {
    this.rows = new Map();
  }

  increment(scope: string, day: string) {
    const key = `${scope}/${day}`;
    const current = this.rows.get(key);
    if (current === undefined) return Promise.resolve(null);
    this.rows.set(key, current + 1);
    return Promise.resolve(current + 1);
  }

  insertFirst(scope: string, day: string) {
    this.rows.set(`${scope}/${day}`, 1);
    return Promise.resolve(1);
  }
}

class InMemoryOrdersRepository
  implements
    Pick<
      OrdersRepository,
      | 'findOwningTenant'
      | 'findById'
      | 'insertHeader'
      | 'updateHeader'
      | 'insertItems'
      | 'deleteItems'
      | 'markPaid'
    >
{
  orders = new Map<string, Order>();
  items = new Map<string, OrderItem[]>();

  reset(): void {
    this.orders = new Map();
    this.items = new Map();
  }

  findOwningTenant(orderId: string) {
    return Promise.resolve(this.orders.get(orderId)?.tenantId ?? null);
  }

  findById(tenantId: string, orderId: string) {
    const order = this.orders.get(orderId);
    return Promise.resolve(order && order.tenantId === tenantId ? order : null);
  }

  insertHeader(tenantId: string, header: OrderHeader) {
    const now = new Date();
    const order: Order = {
      ...header,
      id: randomUUID(),
      tenantId,
      createdAt: now,
      updatedAt: now,
    };
    this.orders.set(order.id, order);
    return Promise.resolve(order);
  }

  updateHeader(tenantId: string, orderId: string, header: OrderHeader) {
    const existing = this.orders.get(orderId);
    if (!existing || existing.tenantId !== tenantId) return Promise.resolve(null);
    const updated: Order = { ...existing, ...header, updatedAt: new Date() };
    this.orders.set(orderId, updated);
    return Promise.resolve(updated);
  }

  insertItems(_tenantId: string, orderId: string, items: readonly OrderItem[]) {
    this.items.set(orderId, [...(this.items.get(orderId) ?? []), ...items]);
    return Promise.resolve();
  }

  deleteItems(_tenantId: string, orderId: string) {
    this.items.delete(orderId);
    return Promise.resolve();
  }

  markPaid(tenantId: string, orderId: string, paymentReference: string) {
    const existing = this.orders.get(orderId);
    if (!existing || existing.tenantId !== tenantId || existing.paid) {
      return Promise.resolve(null);
    }
    const updated: Order = {
      ...existing,
      paid: true,
      status: 'confirmed',
      paymentReference,
    };
    this.orders.set(orderId, updated);
    return Promise.resolve(updated);
  }
}

class FakePaymentGateway implements PaymentGateway {
  readonly minimumAmountMinor = 50;
  intents = new Map<string, PaymentIntentSummary>();

  reset(): void {
    this.intents = new Map();
  }

  authorize(params: AuthorizePaymentParams): Promise<PaymentAuthorization> {
    const id = `pi_test${this.intents.size + 1}`;
    this.intents.set(id, {
      id,
      status: 'requires_payment_method',
      amountMinor: params.amountMinor,
      currency: params.currency,
      metadata: params.metadata,
    });
    return Promise.resolve({
      clientSecret: `${id}_secret_test`,
      paymentIntentId: id,
    });
  }

  retrieve(paymentIntentId: string): Promise<PaymentIntentSummary> {
    const intent = this.intents.get(paymentIntentId);
    if (!intent) {
      return Promise.reject(
        new PaymentGatewayError('No such payment_intent', 404),
      );
    }
    return Promise.resolve(intent);
  }

  succeed(paymentIntentId: string): void {
    const intent = this.intents.get(paymentIntentId);
    if (intent) {
      this.intents.set(paymentIntentId, { ...intent, status: 'succeeded' });
    }
  }
}

const tokenFor = (userId: string) =>
  jwt.sign({ sub: userId, email: `${userId.slice(0, 8)}@example.com` }, JWT_SECRET, {
    algorithm: 'HS256',
    expiresIn: '5m',
  });

const orderBody = (overrides: Record<string, unknown> = {}) => ({
  items: [
    {
      menuItemId: MARGHERITA_ID,
      name: 'Margherita',
      quantity: 2,
      unitPrice: 6,
      subtotal: 12,
    },
  ],
  orderType: 'takeaway',
  paymentMethod: 'cash',
  customerName: 'Ada',
  customerPhone: '+39 000 0000',
  subtotal: 12,
  deliveryFee: 0,
  total: 12,
  ...overrides,
});

describe('AppController (e2e)', () => {
  let app: NestExpressApplication;
  let http: ReturnType<typeof request>;
  const tenants = new InMemoryTenantsRepository();
  const rateLimits = new InMemoryRateLimitRepository();
  const counters = new InMemoryCounterRepository();
  const orders = new InMemoryOrdersRepository();
  const gateway = new FakePaymentGateway();

  beforeAll(async () => {
    const moduleFixture: TestingModule = await NestTest.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(ORDERING_CONFIG)
      .useValue(
        loadOrderingConfig({
          AUTH_JWT_SECRET: JWT_SECRET,
          PLACE_ORDER_RATE_LIMIT_MAX: '2',
        }),
      )
      .overrideProvider(DatabaseService)
      .useValue({
        query: jest.fn(),
        end: jest.fn(),
        transaction: <T>(work: (client: { query: jest.Mock }) => Promise<T>) =>
          work({ query: jest.fn() }),
      })
      .overrideProvider(TenantsRepository)
      .useValue(tenants)
      .overrideProvider(CatalogRepository)
      .useValue(new InMemoryCatalogRepository())
      .overrideProvider(RateLimitRepository)
      .useValue(rateLimits)
      .overrideProvider(DailyCounterRepository)
      .useValue(counters)
      .overrideProvider(OrdersRepository)
      .useValue(orders)
      .overrideProvider(StaffDevicesRepository)
      .useValue({ findStaffPushTokens: () => Promise.resolve([]) })
      .overrideProvider(PAYMENT_GATEWAY)
      .useValue(gateway)
      .compile();

    app = moduleFixture.createNestApplication<NestExpressApplication>();
    configureApp(app);
    await app.init();
    http = request(app.getHttpServer());
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    tenants.reset();
    rateLimits.reset();
    counters.reset();
    orders.reset();
    gateway.reset();
  });

  const apiPrefix = `/${getApiPrefix()}`;

  it('GET /api/v1/health returns envelope', async () => {
    const response = await http.get(`${apiPrefix}/health`).expect(200);
    const envelope = response.body as Envelope;

    expect(envelope.code).toBe('OK');
    expect(envelope.message).toBe('success');
    expect(envelope.details).toMatchObject({ status: 'ok', database: 'up' });
    expect(envelope.details).toHaveProperty('timestamp');
  });

  it('GET /api/v1 returns service metadata', async () => {
    const response = await http.get(apiPrefix).expect(200);

    expect(response.body).toEqual({
      code: 'OK',
      message: 'success',
      details: { service: 'pizzeria-order-api', version: 'api/v1' },
    });
  });

  it('POST /api/v1/orders requires a bearer token', async () => {
    const response = await http
      .post(`${apiPrefix}/orders`)
      .send(orderBody())
      .expect(401);

    expect(response.body).toEqual({
      code: 'unauthorized',
      message: 'Missing authorization header',
      details: null,
    });
  });

  it('POST /api/v1/orders rejects tokens signed with another secret', async () => {
    const forged = jwt.sign({ sub: CUSTOMER_ID }, 'another-secret');

    const response = await http
      .post(`${apiPrefix}/orders`)
      .set('Authorization', `Bearer ${forged}`)
      .send(orderBody())
      .expect(401);

    expect((response.body as Envelope).message).toBe('Invalid or expired token');
  });

  it('POST /api/v1/orders validates the request shape', async () => {
    const response = await http
      .post(`${apiPrefix}/orders`)
      .set('Authorization', `Bearer ${tokenFor(CUSTOMER_ID)}`)
      .send(orderBody({ items: [] }))
      .expect(400);

    const envelope = response.body as Envelope<{
      issues: Array<{ path: string; message: string }>;
    }>;
    expect(envelope.code).toBe('validation_failed');
    expect(envelope.details.issues[0]?.path).toBe('items');
  });

  it('POST /api/v1/orders stores server prices and joins the tenant', async () => {
    const response = await http
      .post(`${apiPrefix}/orders`)
      .set('Authorization', `Bearer ${tokenFor(CUSTOMER_ID)}`)
      .send(
        orderBody({
          items: [
            {
              menuItemId: MARGHERITA_ID,
              name: 'Margherita',
              quantity: 2,
              unitPrice: 4,
              subtotal: 8,
            },
          ],
          subtotal: 8,
          total: 8,
        }),
      )
      .expect(200);

    const envelope = response.body as Envelope<{
      success: boolean;
      orderId: string;
      orderNumber: string;
      total: number;
      corrected: boolean;
    }>;
    expect(envelope.details).toMatchObject({
      success: true,
      total: 12,
      corrected: true,
    });
    expect(envelope.details.orderNumber).toMatch(/^\d{8}-0001$/);

    const stored = orders.orders.get(envelope.details.orderId);
    expect(stored).toMatchObject({
      tenantId: TENANT_ID,
      customerId: CUSTOMER_ID,
      status: 'confirmed',
      subtotal: 12,
      total: 12,
    });
    expect(orders.items.get(envelope.details.orderId)).toEqual([
      expect.objectContaining({ unitPrice: 6, subtotal: 12 }),
    ]);
    expect(tenants.memberships).toContainEqual(
      expect.objectContaining({
        tenantId: TENANT_ID,
        userId: CUSTOMER_ID,
        role: 'customer',
      }),
    );
  });

  it('POST /api/v1/orders rejects items from another tenant', async () => {
    const response = await http
      .post(`${apiPrefix}/orders`)
      .set('Authorization', `Bearer ${tokenFor(CUSTOMER_ID)}`)
      .send(
        orderBody({
          items: [
            {
              menuItemId: FOREIGN_ITEM_ID,
              name: 'Elsewhere',
              quantity: 1,
              unitPrice: 5,
              subtotal: 5,
            },
          ],
        }),
      )
      .expect(400);

    expect(response.body).toEqual({
      code: 'invalid_items',
      message: 'Some items are not available in this menu',
      details: { menuItemIds: [FOREIGN_ITEM_ID], sizeIds: [], ingredientIds: [] },
    });
    expect(orders.orders.size).toBe(0);
  });

  it('POST /api/v1/orders throttles per tenant', async () => {
    const token = tokenFor(CUSTOMER_ID);
    for (let i = 0; i < 2; i += 1) {
      await http
        .post(`${apiPrefix}/orders`)
        .set('Authorization', `Bearer ${token}`)
        .send(orderBody())
        .expect(200);
    }

    const response = await http
      .post(`${apiPrefix}/orders`)
      .set('Authorization', `Bearer ${token}`)
      .send(orderBody())
      .expect(429);

    const envelope = response.body as Envelope<{
      retryAfter: number;
      resetAt: string;
    }>;
    expect(envelope.code).toBe('rate_limit_exceeded');
    expect(response.headers['retry-after']).toBe(
      String(envelope.details.retryAfter),
    );
    expect(orders.orders.size).toBe(2);
  });

  it('POST /api/v1/orders lets staff edit an order and keep its number', async () => {
    const placed = await http
      .post(`${apiPrefix}/orders`)
      .set('Authorization', `Bearer ${tokenFor(CUSTOMER_ID)}`)
      .send(orderBody())
      .expect(200);
    const { orderId, orderNumber } = (
      placed.body as Envelope<{ orderId: string; orderNumber: string }>
    ).details;

    const edited = await http
      .post(`${apiPrefix}/orders`)
      .set('Authorization', `Bearer ${tokenFor(MANAGER_ID)}`)
      .send(
        orderBody({
          orderId,
          items: [
            {
              menuItemId: DIAVOLA_ID,
              name: 'Diavola',
              quantity: 1,
              unitPrice: 7,
              subtotal: 7,
            },
          ],
          status: 'preparing',
        }),
      )
      .expect(200);

    expect((edited.body as Envelope).details).toMatchObject({
      orderId,
      orderNumber,
      total: 7,
      corrected: false,
    });
    expect(orders.orders.get(orderId)).toMatchObject({
      status: 'preparing',
      customerId: CUSTOMER_ID,
    });
    expect(orders.items.get(orderId)).toEqual([
      expect.objectContaining({ menuItemId: DIAVOLA_ID, position: 0 }),
    ]);
  });

  it('POST /api/v1/orders refuses edits from customers', async () => {
    const response = await http
      .post(`${apiPrefix}/orders`)
      .set('Authorization', `Bearer ${tokenFor(CUSTOMER_ID)}`)
      .send(orderBody({ orderId: randomUUID() }))
      .expect(403);

    expect((response.body as Envelope).code).toBe('forbidden');
  });

  it('opens, then verifies, a card payment', async () => {
    const token = tokenFor(CUSTOMER_ID);
    const placed = await http
      .post(`${apiPrefix}/orders`)
      .set('Authorization', `Bearer ${token}`)
      .send(orderBody({ paymentMethod: 'card' }))
      .expect(200);
    const details = (
      placed.body as Envelope<{
        orderId: string;
        clientSecret: string;
        paymentIntentId: string;
      }>
    ).details;

    expect(details.clientSecret).toBe('pi_test1_secret_test');
    expect(gateway.intents.get('pi_test1')).toMatchObject({
      amountMinor: 1200,
      currency: 'eur',
      metadata: {
        userId: CUSTOMER_ID,
        orderId: details.orderId,
        tenantId: TENANT_ID,
      },
    });

    const early = await http
      .post(`${apiPrefix}/orders/${details.orderId}/verify-payment`)
      .set('Authorization', `Bearer ${token}`)
      .send({ paymentIntentId: 'pi_test1' })
      .expect(400);
    expect((early.body as Envelope).code).toBe('payment_not_succeeded');

    gateway.succeed('pi_test1');
    const verified = await http
      .post(`${apiPrefix}/orders/${details.orderId}/verify-payment`)
      .set('Authorization', `Bearer ${token}`)
      .send({ paymentIntentId: 'pi_test1' })
      .expect(200);

    expect((verified.body as Envelope).details).toMatchObject({
      paid: true,
      status: 'confirmed',
    });
    expect(orders.orders.get(details.orderId)).toMatchObject({
      paid: true,
      paymentReference: 'pi_test1',
    });

    const retried = await http
      .post(`${apiPrefix}/orders/${details.orderId}/payment`)
      .set('Authorization', `Bearer ${token}`)
      .send({})
      .expect(409);
    expect((retried.body as Envelope).code).toBe('order_already_paid');
  });

  it('reopens a payment for an unpaid card order', async () => {
    const token = tokenFor(CUSTOMER_ID);
    const placed = await http
      .post(`${apiPrefix}/orders`)
      .set('Authorization', `Bearer ${token}`)
      .send(orderBody({ paymentMethod: 'card' }))
      .expect(200);
    const { orderId } = (placed.body as Envelope<{ orderId: string }>).details;

    const response = await http
      .post(`${apiPrefix}/orders/${orderId}/payment`)
      .set('Authorization', `Bearer ${token}`)
      .send({})
      .expect(200);

    expect((response.body as Envelope).details).toMatchObject({
      orderId,
      total: 12,
      paymentIntentId: 'pi_test2',
    });
  });

  it('rejects a malformed payment intent id', async () => {
    const response = await http
      .post(`${apiPrefix}/orders/${randomUUID()}/verify-payment`)
      .set('Authorization', `Bearer ${tokenFor(CUSTOMER_ID)}`)
      .send({ paymentIntentId: 'ch_123' })
      .expect(400);

    expect((response.body as Envelope).code).toBe('validation_failed');
  });
});
