import Database from 'better-sqlite3'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { monthKeyOf } from './dates.js'
import {
  isExpenseCategory,
  isInvestmentType,
  type Budget,
  type BudgetInput,
  type Expense,
  type ExpenseCategory,
  type ExpenseInput,
  type Investment,
  type InvestmentInput,
  type InvestmentType,
  type MonthlyReport,
  type Profile,
  type RecordFilter,
  type ReportSnapshot,
} from '../records/record-types.js'

export interface RecordStore {
  getProfile: (owner: string) => Profile | null
  saveProfile: (profile: Profile) => Profile

  insertExpense: (owner: string, input: ExpenseInput) => Expense
  updateExpense: (owner: string, id: number, input: ExpenseInput) => Expense | null
  deleteExpense: (owner: string, id: number) => boolean
  getExpense: (owner: string, id: number) => Expense | null
  listExpenses: (owner: string, filter?: RecordFilter<ExpenseCategory>) => Expense[]
  listExpensesForMonth: (owner: string, monthKey: string) => Expense[]
  listExpensesForCategoryMonth: (owner: string, category: ExpenseCategory, monthKey: string) => Expense[]
  listRecentExpenses: (owner: string, limit: number) => Expense[]

  insertInvestment: (owner: string, input: InvestmentInput) => Investment
  updateInvestment: (owner: string, id: number, input: InvestmentInput) => Investment | null
  deleteInvestment: (owner: string, id: number) => boolean
  getInvestment: (owner: string, id: number) => Investment | null
  listInvestments: (owner: string, filter?: RecordFilter<InvestmentType>) => Investment[]
  listInvestmentsForMonth: (owner: string, monthKey: string) => Investment[]
  listRecentInvestments: (owner: string, limit: number) => Investment[]

  upsertBudget: (owner: string, input: BudgetInput) => Budget
  getBudget: (owner: string, category: ExpenseCategory, monthKey: string) => Budget | null
  listBudgetsForMonth: (owner: string, monthKey: string) => Budget[]
  latestBudgetMonth: (owner: string) => string | null

  saveReport: (snapshot: ReportSnapshot) => MonthlyReport
  getReport: (owner: string, monthKey: string) => MonthlyReport | null
  listReports: (owner: string) => MonthlyReport[]
  countReports: (owner: string) => number

  /** Runs `fn` in a single SQLite transaction; any throw rolls everything back. */
  transaction: <T>(fn: () => T) => T
  close: () => void
}

export interface RecordStoreOptions {
  /** Clock used for createdAt/updatedAt columns */
  now?: () => Date
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS profiles (
    owner TEXT PRIMARY KEY,
    full_name TEXT NOT NULL DEFAULT '',
    monthly_salary INTEGER NOT NULL DEFAULT 0 CHECK (monthly_salary >= 0),
    phone_number TEXT NOT NULL DEFAULT '',
    date_of_birth TEXT,
    address TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS expenses (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    owner TEXT NOT NULL,
    category TEXT NOT NULL,
    amount INTEGER NOT NULL CHECK (amount >= 0),
    description TEXT NOT NULL,
    occurred_at TEXT NOT NULL,
    month_key TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS expenses_owner_month ON expenses (owner, month_key);

  CREATE TABLE IF NOT EXISTS investments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    owner TEXT NOT NULL,
    investment_type TEXT NOT NULL,
    amount INTEGER NOT NULL CHECK (amount >= 0),
    description TEXT NOT NULL,
    occurred_at TEXT NOT NULL,
    month_key TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS investments_owner_month ON investments (owner, month_key);

  CREATE TABLE IF NOT EXISTS budgets (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    owner TEXT NOT NULL,
    category TEXT NOT NULL,
    month_key TEXT NOT NULL,
    allocated_amount INTEGER NOT NULL CHECK (allocated_amount >= 0),
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    UNIQUE (owner, category, month_key)
  );

  CREATE TABLE IF NOT EXISTS monthly_reports (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    owner TEXT NOT NULL,
    month_key TEXT NOT NULL,
    total_income INTEGER NOT NULL,
    total_expenses INTEGER NOT NULL,
    total_investments INTEGER NOT NULL,
    total_savings INTEGER NOT NULL,
    artifact_path TEXT NOT NULL,
    generated_at TEXT NOT NULL,
    UNIQUE (owner, month_key)
  );
`

// ── Row shapes ──────────────────────────────────────────────────────────────

interface ProfileRow {
  owner: string
  full_name: string
  monthly_salary: number
  phone_number: string
  date_of_birth: string | null
  address: string
  created_at: string
  updated_at: string
}

interface EntryRow {
  id: number
  owner: string
  label: string
  amount: number
  description: string
  occurred_at: string
  month_key: string
  created_at: string
}

interface BudgetRow {
  id: number
  owner: string
  category: string
  month_key: string
  allocated_amount: number
  created_at: string
  updated_at: string
}

interface ReportRow {
  id: number
  owner: string
  month_key: string
  total_income: number
  total_expenses: number
  total_investments: number
  total_savings: number
  artifact_path: string
  generated_at: string
}

const toProfile = (row: ProfileRow): Profile => ({
  owner: row.owner,
  fullName: row.full_name,
  monthlySalary: row.monthly_salary,
  phoneNumber: row.phone_number,
  dateOfBirth: row.date_of_birth,
  address: row.address,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
})

const toExpense = (row: EntryRow): Expense => {
  if (!isExpenseCategory(row.label)) {
    throw new Error(`Expense ${row.id} has unknown category "${row.label}"`)
  }
  return {
    id: row.id,
    owner: row.owner,
    category: row.label,
    amount: row.amount,
    description: row.description,
    occurredAt: row.occurred_at,
    monthKey: row.month_key,
    createdAt: row.created_at,
  }
}

const toInvestment = (row: EntryRow): Investment => {
  if (!isInvestmentType(row.label)) {
    throw new Error(`Investment ${row.id} has unknown type "${row.label}"`)
  }
  return {
    id: row.id,
    owner: row.owner,
    investmentType: row.label,
    amount: row.amount,
    description: row.description,
    occurredAt: row.occurred_at,
    monthKey: row.month_key,
    createdAt: row.created_at,
  }
}

const toBudget = (row: BudgetRow): Budget => {
  if (!isExpenseCategory(row.category)) {
    throw new Error(`Budget ${row.id} has unknown category "${row.category}"`)
  }
  return {
    id: row.id,
    owner: row.owner,
    category: row.category,
    monthKey: row.month_key,
    allocatedAmount: row.allocated_amount,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

const toReport = (row: ReportRow): MonthlyReport => ({
  id: row.id,
  owner: row.owner,
  monthKey: row.month_key,
  totalIncome: row.total_income,
  totalExpenses: row.total_expenses,
  totalInvestments: row.total_investments,
  totalSavings: row.total_savings,
  artifactPath: row.artifact_path,
  generatedAt: row.generated_at,
})

// ── Ledgers (expenses and investments share one table layout) ──────────────

interface LedgerInput {
  label: string
  amount: number
  description: string
  occurredAt: string
}

type LedgerParams = Record<string, string | number>

const createLedger = <T>(
  db: Database.Database,
  table: 'expenses' | 'investments',
  labelColumn: 'category' | 'investment_type',
  toRecord: (row: EntryRow) => T,
  now: () => Date
) => {
  const columns = `id, owner, ${labelColumn} AS label, amount, description, occurred_at, month_key, created_at`
  const order = 'ORDER BY occurred_at DESC, id DESC'

  const insertStmt = db.prepare<LedgerParams, EntryRow>(
    `INSERT INTO ${table} (owner, ${labelColumn}, amount, description, occurred_at, month_key, created_at)
     VALUES (@owner, @label, @amount, @description, @occurredAt, @monthKey, @createdAt)
     RETURNING ${columns}`
  )
  const updateStmt = db.prepare<LedgerParams, EntryRow>(
    `UPDATE ${table}
     SET ${labelColumn} = @label, amount = @amount, description = @description,
         occurred_at = @occurredAt, month_key = @monthKey
     WHERE id = @id AND owner = @owner
     RETURNING ${columns}`
  )
  const deleteStmt = db.prepare<[number, string]>(`DELETE FROM ${table} WHERE id = ? AND owner = ?`)
  const getStmt = db.prepare<[number, string], EntryRow>(
    `SELECT ${columns} FROM ${table} WHERE id = ? AND owner = ?`
  )
  const monthStmt = db.prepare<[string, string], EntryRow>(
    `SELECT ${columns} FROM ${table} WHERE owner = ? AND month_key = ? ${order}`
  )
  const labelMonthStmt = db.prepare<[string, string, string], EntryRow>(
    `SELECT ${columns} FROM ${table} WHERE owner = ? AND ${labelColumn} = ? AND month_key = ? ${order}`
  )
  const recentStmt = db.prepare<[string, number], EntryRow>(
    `SELECT ${columns} FROM ${table} WHERE owner = ? ${order} LIMIT ?`
  )

  // occurredAt is normalized to UTC ISO so the month key and ordering agree
  const toParams = (owner: string, input: LedgerInput): LedgerParams => {
    const occurredAt = new Date(input.occurredAt).toISOString()
    return {
      owner,
      label: input.label,
      amount: input.amount,
      description: input.description,
      occurredAt,
      monthKey: monthKeyOf(occurredAt),
    }
  }

  const list = (owner: string, filter: RecordFilter<string> = {}): T[] => {
    const conditions = ['owner = @owner']
    const params: LedgerParams = { owner }

    if (filter.label) {
      conditions.push(`${labelColumn} = @label`)
      params.label = filter.label
    }
    if (filter.from) {
      conditions.push('substr(occurred_at, 1, 10) >= @from')
      params.from = filter.from
    }
    if (filter.to) {
      conditions.push('substr(occurred_at, 1, 10) <= @to')
      params.to = filter.to
    }
    if (filter.search) {
      conditions.push('instr(lower(description), lower(@search)) > 0')
      params.search = filter.search
    }

    return db
      .prepare<LedgerParams, EntryRow>(
        `SELECT ${columns} FROM ${table} WHERE ${conditions.join(' AND ')} ${order}`
      )
      .all(params)
      .map(toRecord)
  }

  return {
    insert: (owner: string, input: LedgerInput): T => {
      const row = insertStmt.get({ ...toParams(owner, input), createdAt: now().toISOString() })
      if (!row) throw new Error(`Insert into ${table} returned no row`)
      return toRecord(row)
    },
    update: (owner: string, id: number, input: LedgerInput): T | null => {
      const row = updateStmt.get({ ...toParams(owner, input), id })
      return row ? toRecord(row) : null
    },
    remove: (owner: string, id: number): boolean => deleteStmt.run(id, owner).changes > 0,
    get: (owner: string, id: number): T | null => {
      const row = getStmt.get(id, owner)
      return row ? toRecord(row) : null
    },
    list,
    listForMonth: (owner: string, monthKey: string): T[] =>
      monthStmt.all(owner, monthKey).map(toRecord),
    listForLabelMonth: (owner: string, label: string, monthKey: string): T[] =>
      labelMonthStmt.all(owner, label, monthKey).map(toRecord),
    listRecent: (owner: string, limit: number): T[] => recentStmt.all(owner, limit).map(toRecord),
  }
}

/**
 * Opens (or creates) the SQLite record store and applies the schema.
 *
 * @example
 * const store = createRecordStore('~/.config/spendly/spendly.db')
 * const expenses = store.listExpensesForMonth('demo', '2024-03')
 */
export const createRecordStore = (
  databasePath: string,
  options: RecordStoreOptions = {}
): RecordStore => {
  const now = options.now ?? (() => new Date())

  if (databasePath !== ':memory:') {
    mkdirSync(dirname(databasePath), { recursive: true })
  }

  const db = new Database(databasePath)
  db.pragma('journal_mode = WAL')
  db.pragma('busy_timeout = 5000')
  db.exec(SCHEMA)

  const expenses = createLedger(db, 'expenses', 'category', toExpense, now)
  const investments = createLedger(db, 'investments', 'investment_type', toInvestment, now)

  // ── Profiles ──
  const getProfileStmt = db.prepare<[string], ProfileRow>('SELECT * FROM profiles WHERE owner = ?')
  const saveProfileStmt = db.prepare<ProfileRow, ProfileRow>(
    `INSERT INTO profiles (owner, full_name, monthly_salary, phone_number, date_of_birth, address, created_at, updated_at)
     VALUES (@owner, @full_name, @monthly_salary, @phone_number, @date_of_birth, @address, @created_at, @updated_at)
     ON CONFLICT (owner) DO UPDATE SET
       full_name = excluded.full_name,
       monthly_salary = excluded.monthly_salary,
       phone_number = excluded.phone_number,
       date_of_birth = excluded.date_of_birth,
       address = excluded.address,
       updated_at = excluded.updated_at
     RETURNING *`
  )

  // ── Budgets ──
  const upsertBudgetStmt = db.prepare<
    { owner: string; category: string; monthKey: string; allocatedAmount: number; now: string },
    BudgetRow
  >(
    `INSERT INTO budgets (owner, category, month_key, allocated_amount, created_at, updated_at)
     VALUES (@owner, @category, @monthKey, @allocatedAmount, @now, @now)
     ON CONFLICT (owner, category, month_key) DO UPDATE SET
       allocated_amount = excluded.allocated_amount,
       updated_at = excluded.updated_at
     RETURNING *`
  )
  const getBudgetStmt = db.prepare<[string, string, string], BudgetRow>(
    'SELECT * FROM budgets WHERE owner = ? AND category = ? AND month_key = ?'
  )
  const monthBudgetsStmt = db.prepare<[string, string], BudgetRow>(
    'SELECT * FROM budgets WHERE owner = ? AND month_key = ? ORDER BY category'
  )
  const latestBudgetMonthStmt = db.prepare<[string], { month: string | null }>(
    'SELECT MAX(month_key) AS month FROM budgets WHERE owner = ?'
  )

  // ── Reports ──
  const saveReportStmt = db.prepare<Omit<ReportRow, 'id'>, ReportRow>(
    `INSERT INTO monthly_reports (owner, month_key, total_income, total_expenses, total_investments, total_savings, artifact_path, generated_at)
     VALUES (@owner, @month_key, @total_income, @total_expenses, @total_investments, @total_savings, @artifact_path, @generated_at)
     ON CONFLICT (owner, month_key) DO UPDATE SET
       total_income = excluded.total_income,
       total_expenses = excluded.total_expenses,
       total_investments = excluded.total_investments,
       total_savings = excluded.total_savings,
       artifact_path = excluded.artifact_path,
       generated_at = excluded.generated_at
     RETURNING *`
  )
  const getReportStmt = db.prepare<[string, string], ReportRow>(
    'SELECT * FROM monthly_reports WHERE owner = ? AND month_key = ?'
  )
  const listReportsStmt = db.prepare<[string], ReportRow>(
    'SELECT * FROM monthly_reports WHERE owner = ? ORDER BY month_key DESC'
  )
  const countReportsStmt = db.prepare<[string], { count: number }>(
    'SELECT COUNT(*) AS count FROM monthly_reports WHERE owner = ?'
  )

  return {
    getProfile: (owner) => {
      const row = getProfileStmt.get(owner)
      return row ? toProfile(row) : null
    },
    saveProfile: (profile) => {
      const row = saveProfileStmt.get({
        owner: profile.owner,
        full_name: profile.fullName,
        monthly_salary: profile.monthlySalary,
        phone_number: profile.phoneNumber,
        date_of_birth: profile.dateOfBirth,
        address: profile.address,
        created_at: profile.createdAt,
        updated_at: profile.updatedAt,
      })
      if (!row) throw new Error(`Saving profile for ${profile.owner} returned no row`)
      return toProfile(row)
    },

    insertExpense: (owner, { category, ...rest }) => expenses.insert(owner, { ...rest, label: category }),
    updateExpense: (owner, id, { category, ...rest }) =>
      expenses.update(owner, id, { ...rest, label: category }),
    deleteExpense: expenses.remove,
    getExpense: expenses.get,
    listExpenses: expenses.list,
    listExpensesForMonth: expenses.listForMonth,
    listExpensesForCategoryMonth: expenses.listForLabelMonth,
    listRecentExpenses: expenses.listRecent,

    insertInvestment: (owner, { investmentType, ...rest }) =>
      investments.insert(owner, { ...rest, label: investmentType }),
    updateInvestment: (owner, id, { investmentType, ...rest }) =>
      investments.update(owner, id, { ...rest, label: investmentType }),
    deleteInvestment: investments.remove,
    getInvestment: investments.get,
    listInvestments: investments.list,
    listInvestmentsForMonth: investments.listForMonth,
    listRecentInvestments: investments.listRecent,

    upsertBudget: (owner, input) => {
      const row = upsertBudgetStmt.get({ owner, ...input, now: now().toISOString() })
      if (!row) throw new Error(`Saving ${input.category} budget for ${input.monthKey} returned no row`)
      return toBudget(row)
    },
    getBudget: (owner, category, monthKey) => {
      const row = getBudgetStmt.get(owner, category, monthKey)
      return row ? toBudget(row) : null
    },
    listBudgetsForMonth: (owner, monthKey) => monthBudgetsStmt.all(owner, monthKey).map(toBudget),
    latestBudgetMonth: (owner) => latestBudgetMonthStmt.get(owner)?.month ?? null,

    saveReport: (snapshot) => {
      const row = saveReportStmt.get({
        owner: snapshot.owner,
        month_key: snapshot.monthKey,
        total_income: snapshot.totalIncome,
        total_expenses: snapshot.totalExpenses,
        total_investments: snapshot.totalInvestments,
        total_savings: snapshot.totalSavings,
        artifact_path: snapshot.artifactPath,
        generated_at: snapshot.generatedAt,
      })
      if (!row) throw new Error(`Saving report for ${snapshot.monthKey} returned no row`)
      return toReport(row)
    },
    getReport: (owner, monthKey) => {
      const row = getReportStmt.get(owner, monthKey)
      return row ? toReport(row) : null
    },
    listReports: (owner) => listReportsStmt.all(owner).map(toReport),
    countReports: (owner) => countReportsStmt.get(owner)?.count ?? 0,

    transaction: <T>(fn: () => T): T => db.transaction(fn)(),
    close: () => db.close(),
  }
}
