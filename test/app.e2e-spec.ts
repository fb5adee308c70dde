import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';

describe('Contact Service (e2e)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    process.env.DATABASE_PATH = ':memory:';

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = configureApp(moduleFixture.createNestApplication());
    await app.init();
  });

  afterAll(async () => {
    await app.close();
    delete process.env.DATABASE_PATH;
  });

  describe('POST /contacts', () => {
    it('should register a contact and keep the email verbatim', async () => {
      const res = await request(app.getHttpServer())
        .post('/contacts')
        .send({ name: 'John Doe', email: 'John.Doe@Example.com' })
        .expect(201);

      expect(res.body.success).toBe(true);
      expect(res.body.data.name).toBe('John Doe');
      expect(res.body.data.email).toBe('John.Doe@Example.com');
      expect(typeof res.body.data.id).toBe('number');
      expect(res.body.timestamp).toBeDefined();
    });

    it('should return 409 for an already registered email', async () => {
      const res = await request(app.getHttpServer())
        .post('/contacts')
        .send({ name: 'Someone Else', email: 'John.Doe@Example.com' })
        .expect(409);

      expect(res.body.success).toBe(false);
      expect(res.body.error.statusCode).toBe(409);
      expect(res.body.error.message).toBe(
        "Contact with email 'John.Doe@Example.com' already exists",
      );
    });

    it('should return 409 to the loser of two simultaneous registrations', async () => {
      const register = () =>
        request(app.getHttpServer())
          .post('/contacts')
          .send({ name: 'Racer', email: 'dup@example.com' });

      const responses = await Promise.all([register(), register()]);
      const statuses = responses.map((res) => res.status).sort();

      expect(statuses).toEqual([201, 409]);
      const conflict = responses.find((res) => res.status === 409);
      expect(conflict?.body.error.message).toBe(
        "Contact with email 'dup@example.com' already exists",
      );
    });

    it('should return 400 with field details for an invalid email', async () => {
      const res = await request(app.getHttpServer())
        .post('/contacts')
        .send({ name: 'John Doe', email: 'not-an-email' })
        .expect(400);

      expect(res.body.success).toBe(false);
      expect(res.body.error.message).toBe('Validation failed');
      expect(res.body.error.details).toEqual([
        {
          field: 'email',
          constraints: {
            isEmailValue: 'email must be a structurally valid email address',
          },
        },
      ]);
    });

    it('should return 400 for unknown properties', async () => {
      const res = await request(app.getHttpServer())
        .post('/contacts')
        .send({ name: 'John Doe', email: 'john@example.com', admin: true })
        .expect(400);

      expect(res.body.error.details[0].field).toBe('admin');
    });
  });

  describe('GET /contacts/:email', () => {
    it('should return the contact for an exact address match', async () => {
      const res = await request(app.getHttpServer())
        .get('/contacts/John.Doe@Example.com')
        .expect(200);

      expect(res.body.success).toBe(true);
      expect(res.body.data.email).toBe('John.Doe@Example.com');
    });

    it('should return 404 when only the casing differs', async () => {
      const res = await request(app.getHttpServer())
        .get('/contacts/john.doe@example.com')
        .expect(404);

      expect(res.body.error.message).toBe(
        "Contact with email 'john.doe@example.com' not found",
      );
    });

    it('should return 400 for an invalid address', async () => {
      const res = await request(app.getHttpServer())
        .get('/contacts/not-an-email')
        .expect(400);

      expect(res.body.success).toBe(false);
      expect(res.body.error.message).toBe('Invalid email format: not-an-email');
    });
  });

  describe('GET /contacts', () => {
    it('should list contacts ordered by email', async () => {
      await request(app.getHttpServer())
        .post('/contacts')
        .send({ name: 'Anna', email: 'anna@example.com' })
        .expect(201);

      const res = await request(app.getHttpServer())
        .get('/contacts')
        .expect(200);

      expect(res.body.data.map((c: { email: string }) => c.email)).toEqual([
        'John.Doe@Example.com',
        'anna@example.com',
        'dup@example.com',
      ]);
    });
  });

  describe('GET /health', () => {
    it('should return healthy status', async () => {
      const res = await request(app.getHttpServer()).get('/health').expect(200);

      expect(res.body.status).toBe('ok');
    });
  });
});
