import cors from 'cors';
import express, { type Express, type Response } from 'express';
import { ZodError } from 'zod';
import { MonthlyPaymentRequestSchema, PayoffTimeRequestSchema, RepaymentPlanRequestSchema } from '../../application/dto/CalculationDTO.js';
import { CreateDebtSchema } from '../../application/dto/DebtDTO.js';
import { type AnswerDTO, AskQuestionSchema } from '../../application/dto/QuestionDTO.js';
import { DebtNotFoundError, InvalidInputError, NeverAmortizesError } from '../../domain/errors/FinancialQueryErrors.js';
import type { AppContainer } from '../bootstrap/AppContainer.js';

const describeValidationError = (error: ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');

const sendFailure = (res: Response, error: unknown, fallbackMessage: string, formatMoney: (amount: number) => string) => {
  if (error instanceof DebtNotFoundError) {
    return res.status(404).json({ error: error.message });
  }
  if (error instanceof NeverAmortizesError) {
    return res.status(400).json({
      error: `Your payment is too low. You need at least ${formatMoney(error.minimumPayment)} to reduce the principal.`,
      minimumPayment: error.minimumPayment,
    });
  }
  if (error instanceof InvalidInputError) {
    return res.status(400).json({ error: error.message });
  }

  console.error(`${fallbackMessage}:`, error);
  return res.status(500).json({ error: error instanceof Error ? error.message : fallbackMessage });
};

export const createApp = (container: AppContainer): Express => {
  const app = express();
  const fail = (res: Response, error: unknown, fallbackMessage: string) =>
    sendFailure(res, error, fallbackMessage, (amount) => container.composer.formatMoney(amount));

  app.use(cors({ origin: container.config.server.corsOrigins, credentials: true }));
  app.use(express.json({ limit: '100kb' }));

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Debt Question API',
      version: '0.1.0',
      status: 'healthy',
      languageModels: container.configuredProviders(),
      baseCurrency: container.config.app.baseCurrency,
    });
  });

  app.get('/api/llm-status', async (req, res) => {
    try {
      const providers = await container.languageModel.status();
      res.json({ providers });
    } catch (error) {
      fail(res, error, 'Unable to check language model status');
    }
  });

  app.post('/api/ask', async (req, res) => {
    const parsed = AskQuestionSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: describeValidationError(parsed.error) });
    }

    try {
      console.log(`🤔 Question received: "${parsed.data.question}"`);
      const resolved = await container.queryResolution.resolve(parsed.data);
      const body: AnswerDTO = { answer: resolved.answer, intent: resolved.intent };
      return res.json(body);
    } catch (error) {
      return fail(res, error, 'Unable to answer question');
    }
  });

  app.post('/api/calculate/payoff-time', (req, res) => {
    const parsed = PayoffTimeRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: describeValidationError(parsed.error) });
    }

    try {
      return res.json(container.calculator.payoffTime(parsed.data));
    } catch (error) {
      return fail(res, error, 'Calculation error');
    }
  });

  app.post('/api/calculate/monthly-payment', (req, res) => {
    const parsed = MonthlyPaymentRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: describeValidationError(parsed.error) });
    }

    try {
      return res.json(container.calculator.monthlyPayment(parsed.data));
    } catch (error) {
      return fail(res, error, 'Calculation error');
    }
  });

  app.post('/api/calculate/repayment-plan', async (req, res) => {
    const parsed = RepaymentPlanRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: describeValidationError(parsed.error) });
    }

    try {
      return res.json(await container.calculator.repaymentPlan(parsed.data));
    } catch (error) {
      return fail(res, error, 'Calculation error');
    }
  });

  app.post('/api/debts', async (req, res) => {
    const parsed = CreateDebtSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: describeValidationError(parsed.error) });
    }

    try {
      return res.status(201).json(await container.debtService.createDebt(parsed.data));
    } catch (error) {
      return fail(res, error, 'Unable to save debt');
    }
  });

  app.get('/api/debts/:userId', async (req, res) => {
    try {
      res.json(await container.debtService.listDebts(req.params.userId));
    } catch (error) {
      fail(res, error, 'Unable to load debts');
    }
  });

  app.delete('/api/debts/:debtId', async (req, res) => {
    try {
      const deleted = await container.debtService.deleteDebt(req.params.debtId);
      if (!deleted) {
        return res.status(404).json({ error: `Debt ${req.params.debtId} not found.` });
      }
      return res.json({ deleted: true });
    } catch (error) {
      return fail(res, error, 'Unable to delete debt');
    }
  });

  app.delete('/api/users/:userId/debts', async (req, res) => {
    try {
      const deleted = await container.debtService.deleteDebtsForUser(req.params.userId);
      res.json({ deleted });
    } catch (error) {
      fail(res, error, 'Unable to delete debts');
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  return app;
};
