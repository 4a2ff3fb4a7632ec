#!/usr/bin/env node
import 'dotenv/config';
import chalk from 'chalk';
import Table from 'cli-table3';
import { Command } from 'commander';
import { loadConfig } from './config';
import { createMongoStore } from './database';
import { expenseRow, formatMoney, REPORT_HEADERS, summarizeExpenses } from './report-format';
import { Store } from './store';
import { Expense } from './types';

const divider = (width: number): string => '='.repeat(width);

function expenseTable(expenses: Expense[], descriptionWidth: number): string {
  const table = new Table({ head: REPORT_HEADERS });
  for (const expense of expenses) {
    table.push(expenseRow(expense, descriptionWidth));
  }
  return table.toString();
}

export async function printAllUsers(store: Store): Promise<void> {
  console.log(chalk.bold('EXPENSES BY USER'));
  console.log(divider(80));

  const users = await store.listUsers();
  if (users.length === 0) {
    console.log('No users found in database.');
    return;
  }

  let expenseCount = 0;
  let grandTotal = 0;

  for (const user of users) {
    console.log(`\n${divider(60)}`);
    console.log(chalk.cyan(`USER: ${user.username} (ID: ${user.id})`));
    console.log(`Email: ${user.email}`);
    console.log(divider(60));

    const expenses = await store.listByOwner(user.id);
    if (expenses.length === 0) {
      console.log('  No expenses found for this user.');
      continue;
    }

    const summary = summarizeExpenses(expenses);
    expenseCount += summary.count;
    grandTotal += summary.totalCents;

    console.log(`  Total Expenses: ${summary.count} items`);
    console.log(`  Total Amount: ${formatMoney(summary.totalCents)}`);
    console.log(expenseTable(expenses, 18));
  }

  console.log(`\n${divider(80)}`);
  console.log(chalk.bold('SUMMARY'));
  console.log(`Total Users: ${users.length}`);
  console.log(`Total Expenses: ${expenseCount}`);
  console.log(`Total Amount: ${formatMoney(grandTotal)}`);
  console.log(divider(80));
}

export async function printSingleUser(store: Store, username: string): Promise<void> {
  const user = await store.findByUsername(username);
  if (!user) {
    console.log(chalk.red(`User '${username}' not found in database.`));
    return;
  }

  console.log(chalk.bold(`EXPENSES FOR: ${user.username}`));
  console.log(`Email: ${user.email}`);
  console.log(divider(60));

  const expenses = await store.listByOwner(user.id);
  if (expenses.length === 0) {
    console.log('No expenses found for this user.');
    return;
  }

  const summary = summarizeExpenses(expenses);
  console.log(`Total Expenses: ${summary.count} items`);
  console.log(`Total Amount: ${formatMoney(summary.totalCents)}`);

  console.log('\nCategory Breakdown:');
  for (const [category, cents] of summary.categories) {
    console.log(`  ${category}: ${formatMoney(cents)}`);
  }

  console.log('\nDetailed Expenses:');
  console.log(expenseTable(expenses, 23));
}

async function main(): Promise<void> {
  const program = new Command()
    .name('expense-report')
    .description('Print stored expenses grouped by user')
    .option('-u, --user <username>', 'only report on this user')
    .parse();

  const { user } = program.opts<{ user?: string }>();
  const config = loadConfig();
  const store = createMongoStore({ uri: config.mongoUri, dbName: config.dbName });

  try {
    await store.init();
    if (user) {
      await printSingleUser(store, user);
    } else {
      await printAllUsers(store);
    }
  } finally {
    await store.close();
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error(chalk.red('Report failed:'), error);
    process.exit(1);
  });
}
