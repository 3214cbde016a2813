import request from 'supertest';
import { createApp } from '../src/app';
import { Application } from 'express';
import { HIGH_CONFIDENCE } from './fixtures/records';

describe('Risk Endpoints', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  describe('POST /api/v1/risk/analyze', () => {
    it('should report no risks for an empty ledger', async () => {
      const response = await request(app).post('/api/v1/risk/analyze').send({ records: [] });

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('message', 'No risks found');
      expect(response.body.data).toEqual({ alerts: [], noAlerts: true });
    });

    it('should return alerts for the snapshot', async () => {
      const response = await request(app)
        .post('/api/v1/risk/analyze')
        .send({
          records: [
            {
              id: 1,
              date: '2024-06-10',
              vendor: 'City Hospital',
              expense: 2500,
              category: 'Medical',
              confidence: HIGH_CONFIDENCE,
            },
          ],
        });

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('message', '1 risk alert(s) raised');
      expect(response.body.data.alerts).toEqual([
        {
          severity: 'low',
          type: 'potential_tax_deductible',
          message: 'Potential tax-deductible expense in category Medical for amount 2500',
          transactionIds: [1],
          recommendedAction: 'Check if this expense qualifies for tax deduction',
          evidence: { category: 'Medical', amount: 2500 },
        },
      ]);
    });

    it('should reject a body without records', async () => {
      const response = await request(app).post('/api/v1/risk/analyze').send({});

      expect(response.status).toBe(400);
    });
  });
});
