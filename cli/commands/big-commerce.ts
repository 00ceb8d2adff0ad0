import type { Command } from 'commander';
import { BigCommerceConnector, BigCommerceConfigSchema } from '../connectors/big-commerce.js';
import type { Table } from '../connectors/base/index.js';
import { createConnector, exportCommand, idListOption, runExport, type ExportOpts } from './shared.js';

type Fetch = (connector: BigCommerceConnector) => Promise<Table>;

const RESOURCES: [name: string, description: string, fetch: Fetch][] = [
  ['brands', 'Export catalog brands', c => c.getBrands()],
  ['products', 'Export catalog products', c => c.getCatalogProducts()],
  ['customers', 'Export customers', c => c.getCustomers()],
  ['categories', 'Export product categories', c => c.getProductCategories()],
  ['variants', 'Export product variants', c => c.getVariants()],
  ['orders', 'Export orders', c => c.getOrders()],
  ['customer-groups', 'Export customer groups', c => c.getCustomerGroups()],
];

function connect(opts: ExportOpts): BigCommerceConnector {
  return createConnector('big-commerce', opts, BigCommerceConfigSchema, (config, deps) => new BigCommerceConnector(config, deps));
}

export function registerBigCommerceCommands(program: Command): void {
  const bc = program
    .command('big-commerce')
    .description('BigCommerce store exports: catalog, customers, orders');

  for (const [name, description, fetch] of RESOURCES) {
    exportCommand(bc, 'big-commerce', name, description)
      .action(async (opts: ExportOpts) => {
        const connector = connect(opts);
        await runExport('big-commerce', name, opts.out, () => fetch(connector));
      });
  }

  exportCommand(bc, 'big-commerce', 'order-products', 'Export the line items of the given orders')
    .requiredOption('--order-ids <ids>', 'Comma-separated order ids', idListOption)
    .action(async (opts: ExportOpts & { orderIds: number[] }) => {
      const connector = connect(opts);
      await runExport('big-commerce', 'order-products', opts.out, () => connector.getOrderProducts(opts.orderIds), {
        orderIds: opts.orderIds,
      });
    });

  exportCommand(bc, 'big-commerce', 'transactions', 'Export the payment transactions of the given orders')
    .requiredOption('--order-ids <ids>', 'Comma-separated order ids', idListOption)
    .action(async (opts: ExportOpts & { orderIds: number[] }) => {
      const connector = connect(opts);
      await runExport('big-commerce', 'transactions', opts.out, () => connector.getTransactions(opts.orderIds), {
        orderIds: opts.orderIds,
      });
    });
}
