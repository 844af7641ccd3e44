import { InventoryDataService, buildContainsPattern } from '../InventoryDataService';
import type { QueryProcessor } from '../types';
import { FakeClient, createFakeConnections, rowsResult, testConfig } from './fakeConnections';

describe('InventoryDataService', () => {
  let client: FakeClient;
  let connect: jest.Mock;
  let service: InventoryDataService;

  beforeEach(() => {
    client = new FakeClient();
    const fake = createFakeConnections(client);
    connect = fake.connect;
    service = new InventoryDataService(fake.factory, { config: testConfig });
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('buildContainsPattern', () => {
    it('wraps the trimmed term in wildcards', () => {
      expect(buildContainsPattern('  tornillo ')).toBe('%tornillo%');
    });
  });

  describe('normalizeLimit', () => {
    it('falls back to the default for missing or non-positive limits', () => {
      expect(service.normalizeLimit(undefined)).toBe(10);
      expect(service.normalizeLimit(0)).toBe(10);
      expect(service.normalizeLimit(-4)).toBe(10);
      expect(service.normalizeLimit(Number.NaN)).toBe(10);
    });

    it('floors fractional limits and caps at the maximum', () => {
      expect(service.normalizeLimit(3.7)).toBe(3);
      expect(service.normalizeLimit(500)).toBe(50);
    });
  });

  describe('searchParts', () => {
    it('returns matches enriched with availability on a single connection', async () => {
      client.queryFn
        .mockResolvedValueOnce(
          rowsResult([
            { id: 1, ItemName: 'Tornillo M6', ItemCode: 'TOR-M6' },
            { id: '2', ItemName: 'Tornillo M8', ItemCode: 'TOR-M8' },
          ])
        )
        .mockResolvedValueOnce(rowsResult([{ warehouse: 'ALM01', quantity: '12.000' }]))
        .mockResolvedValueOnce(rowsResult([]));

      const parts = await service.searchParts('tornillo');

      expect(parts).toEqual([
        {
          id: 1,
          itemName: 'Tornillo M6',
          itemCode: 'TOR-M6',
          availability: [{ warehouse: 'ALM01', quantity: 12 }],
        },
        { id: 2, itemName: 'Tornillo M8', itemCode: 'TOR-M8', availability: [] },
      ]);

      const [searchSql, searchParams] = client.queryFn.mock.calls[0];
      expect(searchSql).toContain('FROM inventory_items');
      expect(searchSql).toContain('ORDER BY "IsCommited" DESC');
      expect(searchParams).toEqual(['%tornillo%', 10]);
      expect(client.queryFn.mock.calls[1][1]).toEqual([1]);
      expect(client.queryFn.mock.calls[2][1]).toEqual([2]);

      expect(connect).toHaveBeenCalledTimes(1);
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('passes the normalized limit to the query', async () => {
      client.queryFn.mockResolvedValueOnce(rowsResult([]));

      await service.searchParts('valvula', 500);

      expect(client.queryFn.mock.calls[0][1]).toEqual(['%valvula%', 50]);
    });

    it('keeps the part with empty availability when enrichment fails', async () => {
      client.queryFn
        .mockResolvedValueOnce(rowsResult([{ id: 7, ItemName: 'Bisagra', ItemCode: 'BIS-01' }]))
        .mockRejectedValueOnce(new Error('statement timeout'));

      const parts = await service.searchParts('bisagra');

      expect(parts).toEqual([{ id: 7, itemName: 'Bisagra', itemCode: 'BIS-01', availability: [] }]);
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('returns an empty list and releases the client when the query fails', async () => {
      client.queryFn.mockRejectedValueOnce(new Error('relation does not exist'));

      await expect(service.searchParts('tornillo')).resolves.toEqual([]);
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('returns an empty list when no connection can be acquired', async () => {
      connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));

      await expect(service.searchParts('tornillo')).resolves.toEqual([]);
      expect(client.queryFn).not.toHaveBeenCalled();
      expect(client.release).not.toHaveBeenCalled();
    });
  });

  describe('searchPartsForStatus', () => {
    it('returns matches enriched with status', async () => {
      client.queryFn
        .mockResolvedValueOnce(
          rowsResult([
            { id: 3, ItemName: 'Puerta', ItemCode: 'PTA-3' },
            { id: 4, ItemName: 'Puerta doble', ItemCode: 'PTA-4' },
          ])
        )
        .mockResolvedValueOnce(rowsResult([{ commit_status: '3', updated_at: new Date('2024-05-01T10:00:00Z') }]))
        .mockResolvedValueOnce(rowsResult([]));

      const parts = await service.searchPartsForStatus('puerta', 5);

      expect(parts).toEqual([
        {
          id: 3,
          itemName: 'Puerta',
          itemCode: 'PTA-3',
          status: { commitStatus: 3, updatedAt: '2024-05-01T10:00:00.000Z' },
        },
        { id: 4, itemName: 'Puerta doble', itemCode: 'PTA-4', status: null },
      ]);

      const [searchSql, searchParams] = client.queryFn.mock.calls[0];
      expect(searchSql).not.toContain('ORDER BY');
      expect(searchParams).toEqual(['%puerta%', 5]);
    });

    it('returns an empty list when the connection raises', async () => {
      connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));

      await expect(service.searchPartsForStatus('puerta')).resolves.toEqual([]);
    });
  });

  describe('getOrderData', () => {
    it('maps the order row', async () => {
      client.queryFn.mockResolvedValueOnce(
        rowsResult([{ DocNum: 1201, CardName: 'Acme SA', PaidToDate: '1500.50', OINVToDate: '1500.50', ODLNToDate: null }])
      );

      const order = await service.getOrderData(1201);

      expect(order).toEqual({
        docNum: 1201,
        cardName: 'Acme SA',
        paidToDate: 1500.5,
        invoicedToDate: 1500.5,
        deliveredToDate: null,
      });
      expect(client.queryFn.mock.calls[0][0]).toContain('WHERE "DocNum" = $1');
      expect(client.queryFn.mock.calls[0][1]).toEqual([1201]);
    });

    it('returns null when the order does not exist', async () => {
      client.queryFn.mockResolvedValueOnce(rowsResult([]));

      await expect(service.getOrderData(9)).resolves.toBeNull();
    });

    it('returns null when the query fails', async () => {
      client.queryFn.mockRejectedValueOnce(new Error('boom'));

      await expect(service.getOrderData(9)).resolves.toBeNull();
      expect(client.release).toHaveBeenCalledTimes(1);
    });
  });

  describe('getInventorySummary', () => {
    it('adds a grand total computed from every warehouse', async () => {
      client.queryFn.mockResolvedValueOnce(
        rowsResult([
          { warehouse: 'ALM01', total_items: '3', total_quantity: '30', avg_quantity: '10.0000' },
          { warehouse: 'ALM02', total_items: '1', total_quantity: null, avg_quantity: null },
        ])
      );

      const summary = await service.getInventorySummary();

      expect(summary).toEqual({
        warehouses: [
          { warehouse: 'ALM01', totalItems: 3, totalQuantity: 30, avgQuantity: 10 },
          { warehouse: 'ALM02', totalItems: 1, totalQuantity: 0, avgQuantity: 0 },
        ],
        totalWarehouses: 2,
        grandTotal: { totalItems: 4, totalQuantity: 30, avgQuantity: 7.5 },
      });
      expect(client.queryFn.mock.calls[0][1]).toBeUndefined();
    });

    it('reports a zero average when there are no items', async () => {
      client.queryFn.mockResolvedValueOnce(rowsResult([]));

      await expect(service.getInventorySummary()).resolves.toEqual({
        warehouses: [],
        totalWarehouses: 0,
        grandTotal: { totalItems: 0, totalQuantity: 0, avgQuantity: 0 },
      });
    });

    it('filters by warehouse without a grand total', async () => {
      client.queryFn.mockResolvedValueOnce(
        rowsResult([{ warehouse: 'ALM01', total_items: 2, total_quantity: 8, avg_quantity: 4 }])
      );

      const summary = await service.getInventorySummary('ALM01');

      expect(summary).toEqual({
        warehouses: [{ warehouse: 'ALM01', totalItems: 2, totalQuantity: 8, avgQuantity: 4 }],
        totalWarehouses: 1,
      });
      expect(client.queryFn.mock.calls[0][0]).toContain('WHERE "DfltWH" = $1');
      expect(client.queryFn.mock.calls[0][1]).toEqual(['ALM01']);
    });

    it('returns an empty mapping when the query fails', async () => {
      client.queryFn.mockRejectedValueOnce(new Error('boom'));

      await expect(service.getInventorySummary()).resolves.toEqual({});
    });
  });

  describe('order listings', () => {
    const orderRow = { DocNum: '88', CardName: 'Vidrios del Norte', PaidToDate: 0, OINVToDate: 0, ODLNToDate: 0 };

    it('lists recent orders newest first', async () => {
      client.queryFn.mockResolvedValueOnce(rowsResult([orderRow]));

      const orders = await service.getRecentOrders();

      expect(orders).toEqual([
        { docNum: 88, cardName: 'Vidrios del Norte', paidToDate: 0, invoicedToDate: 0, deliveredToDate: 0 },
      ]);
      expect(client.queryFn.mock.calls[0][0]).toContain('ORDER BY "DocNum" DESC');
      expect(client.queryFn.mock.calls[0][1]).toEqual([10]);
    });

    it('searches orders by client name', async () => {
      client.queryFn.mockResolvedValueOnce(rowsResult([orderRow]));

      const orders = await service.searchOrdersByClient('Vidrios', 5);

      expect(orders).toHaveLength(1);
      expect(client.queryFn.mock.calls[0][0]).toContain('"CardName" ILIKE $1');
      expect(client.queryFn.mock.calls[0][1]).toEqual(['%Vidrios%', 5]);
    });

    it('returns empty lists when the connection raises', async () => {
      connect.mockRejectedValue(new Error('ECONNREFUSED'));

      await expect(service.getRecentOrders()).resolves.toEqual([]);
      await expect(service.searchOrdersByClient('Acme')).resolves.toEqual([]);
    });
  });

  describe('enrichment helpers', () => {
    it('acquire their own connection when none is given', async () => {
      client.queryFn.mockResolvedValueOnce(rowsResult([{ warehouse: 'ALM03', quantity: 6 }]));

      await expect(service.getPartAvailability(12)).resolves.toEqual([{ warehouse: 'ALM03', quantity: 6 }]);
      expect(connect).toHaveBeenCalledTimes(1);
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('return null status when the lookup fails', async () => {
      client.queryFn.mockRejectedValueOnce(new Error('boom'));

      await expect(service.getPartStatus(12)).resolves.toBeNull();
    });
  });

  describe('getLowStockItems', () => {
    it('uses the configured threshold by default', async () => {
      client.queryFn.mockResolvedValueOnce(
        rowsResult([{ id: 5, ItemName: 'Empaque', ItemCode: 'EMP-5', OnHand: '0', DfltWH: 'ALM02' }])
      );

      const items = await service.getLowStockItems();

      expect(items).toEqual([{ id: 5, itemName: 'Empaque', itemCode: 'EMP-5', onHand: 0, warehouse: 'ALM02' }]);
      expect(client.queryFn.mock.calls[0][0]).toContain('ORDER BY "OnHand" ASC');
      expect(client.queryFn.mock.calls[0][1]).toEqual([5]);
    });

    it('accepts an explicit threshold', async () => {
      client.queryFn.mockResolvedValueOnce(rowsResult([]));

      await service.getLowStockItems(2);

      expect(client.queryFn.mock.calls[0][1]).toEqual([2]);
    });

    it('returns an empty list when the query fails', async () => {
      client.queryFn.mockRejectedValueOnce(new Error('boom'));

      await expect(service.getLowStockItems()).resolves.toEqual([]);
    });
  });

  describe('getDatabaseStats', () => {
    it('collects counts and treats a null stock sum as zero', async () => {
      client.queryFn
        .mockResolvedValueOnce(rowsResult([{ total: '120' }]))
        .mockResolvedValueOnce(rowsResult([{ total: '45' }]))
        .mockResolvedValueOnce(rowsResult([{ total: 3 }]))
        .mockResolvedValueOnce(rowsResult([{ total: null }]));

      await expect(service.getDatabaseStats()).resolves.toEqual({
        totalParts: 120,
        totalOrders: 45,
        totalWarehouses: 3,
        totalStockQuantity: 0,
      });
      expect(client.queryFn).toHaveBeenCalledTimes(4);
      expect(client.queryFn.mock.calls[2][0]).toContain('COUNT(DISTINCT "DfltWH")');
      expect(client.queryFn.mock.calls[3][0]).toContain('WHERE "OnHand" > 0');
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('returns an empty mapping when the connection raises', async () => {
      connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));

      await expect(service.getDatabaseStats()).resolves.toEqual({});
    });
  });

  describe('testConnection', () => {
    it('is true when the probe returns a row', async () => {
      client.queryFn.mockResolvedValueOnce(rowsResult([{ ok: 1 }]));

      await expect(service.testConnection()).resolves.toBe(true);
    });

    it('is false when the connection raises', async () => {
      connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));

      await expect(service.testConnection()).resolves.toBe(false);
    });
  });

  describe('processAutomaticQuery', () => {
    it('delegates to the injected processor', async () => {
      const processor: QueryProcessor = { process: jest.fn().mockResolvedValue('respuesta') };
      const withProcessor = new InventoryDataService(createFakeConnections(client).factory, {
        config: testConfig,
        queryProcessor: processor,
      });

      await expect(withProcessor.processAutomaticQuery('orden 5')).resolves.toBe('respuesta');
      expect(processor.process).toHaveBeenCalledWith('orden 5');
    });

    it('returns null when the processor throws', async () => {
      const processor: QueryProcessor = { process: jest.fn().mockRejectedValue(new Error('model offline')) };
      const withProcessor = new InventoryDataService(createFakeConnections(client).factory, {
        config: testConfig,
        queryProcessor: processor,
      });

      await expect(withProcessor.processAutomaticQuery('hola')).resolves.toBeNull();
    });

    it('answers order questions with the built-in processor', async () => {
      client.queryFn.mockResolvedValueOnce(
        rowsResult([{ DocNum: 77, CardName: 'Acme SA', PaidToDate: 100, OINVToDate: 50, ODLNToDate: 0 }])
      );

      const answer = await service.processAutomaticQuery('quiero ver la orden 77');

      expect(answer).toBe(
        '📄 *Orden #77 - Acme SA*\n💰 Pagado: *100*\n🧾 Facturado: *50*\n🚚 Entregado: *0*'
      );
      expect(client.queryFn.mock.calls[0][1]).toEqual([77]);
    });

    it('replies with an error instead of "not found" when the database is unreachable', async () => {
      connect.mockRejectedValue(new Error('ECONNREFUSED'));

      await expect(service.processAutomaticQuery('orden 5')).resolves.toBe('⚠️ Error consultando orden 5.');
      await expect(service.processAutomaticQuery('buscar tornillo')).resolves.toBe(
        "⚠️ Error consultando 'tornillo'. Intenta con el menú principal."
      );
      await expect(service.processAutomaticQuery('situación de chapa')).resolves.toBe(
        "⚠️ Error consultando estatus de 'chapa'."
      );
    });

    it('releases the client and replies with an error when the order query fails', async () => {
      client.queryFn.mockRejectedValueOnce(new Error('relation "sales_orders" does not exist'));

      await expect(service.processAutomaticQuery('pedido 12')).resolves.toBe('⚠️ Error consultando orden 12.');
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('returns null for messages that are not database queries', async () => {
      await expect(service.processAutomaticQuery('hola, buenos días')).resolves.toBeNull();
      expect(connect).not.toHaveBeenCalled();
    });
  });
});
