import { Router } from 'express';
import healthRoutes from './health.routes';
import categoriesRoutes from './categories.routes';
import reconciliationRoutes from './reconciliation.routes';
import ledgerRoutes from './ledger.routes';
import riskRoutes from './risk.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Category listing and suggestions
router.use('/categories', categoriesRoutes);

// Candidate ingestion checks, confidence, duplicates, summary
router.use('/reconciliation', reconciliationRoutes);

// Running balance recalculation
router.use('/ledger', ledgerRoutes);

// Risk alerts
router.use('/risk', riskRoutes);

export default router;
