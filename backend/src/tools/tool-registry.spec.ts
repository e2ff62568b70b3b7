import { Test, TestingModule } from '@nestjs/testing';
import { IdentityApiClient } from '../identity/identity-api.client';
import { ToolRegistry } from './tool-registry';

describe('ToolRegistry', () => {
  let registry: ToolRegistry;
  let mockIdentityClient: Partial<IdentityApiClient>;

  beforeEach(async () => {
    mockIdentityClient = {
      invoke: jest.fn().mockResolvedValue({
        status: 'success',
        payload: { success: true },
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ToolRegistry,
        { provide: IdentityApiClient, useValue: mockIdentityClient },
      ],
    }).compile();

    registry = module.get<ToolRegistry>(ToolRegistry);
  });

  describe('list', () => {
    it('should expose the three identity tools', () => {
      expect(registry.list().map((definition) => definition.name)).toEqual([
        'trigger_identity_refresh',
        'check_request_status',
        'get_identity_info',
      ]);
      expect(registry.names()).toHaveLength(3);
    });

    it('should describe every tool', () => {
      for (const definition of registry.list()) {
        expect(definition.description.length).toBeGreaterThan(0);
      }
    });
  });

  describe('dispatch', () => {
    it('should pass validated arguments to the identity client', async () => {
      const result = await registry.dispatch('trigger_identity_refresh', {
        user_id: '  Ram  ',
        reason: 'Dynamic access not provisioned',
      });

      expect(result).toEqual({ status: 'success', payload: { success: true } });
      expect(mockIdentityClient.invoke).toHaveBeenCalledWith(
        'trigger_identity_refresh',
        { user_id: 'Ram', reason: 'Dynamic access not provisioned' },
      );
    });

    it('should reject unknown tools without calling the client', async () => {
      const result = await registry.dispatch('delete_user', { user_id: 'Ram' });

      expect(result).toEqual({
        status: 'error',
        errorKind: 'validation',
        payload:
          'Unknown tool "delete_user". Available tools: trigger_identity_refresh, check_request_status, get_identity_info',
      });
      expect(mockIdentityClient.invoke).not.toHaveBeenCalled();
    });

    it('should reject a missing required argument', async () => {
      const result = await registry.dispatch('trigger_identity_refresh', {});

      expect(result).toEqual({
        status: 'error',
        errorKind: 'validation',
        payload: 'Invalid arguments for trigger_identity_refresh: user_id: Required',
      });
      expect(mockIdentityClient.invoke).not.toHaveBeenCalled();
    });

    it('should reject a blank user id', async () => {
      const result = await registry.dispatch('get_identity_info', {
        user_id: '   ',
      });

      expect(result).toMatchObject({ status: 'error', errorKind: 'validation' });
      expect(mockIdentityClient.invoke).not.toHaveBeenCalled();
    });

    it('should treat undefined arguments as an empty object', async () => {
      const result = await registry.dispatch('check_request_status', undefined);

      expect(result).toEqual({
        status: 'error',
        errorKind: 'validation',
        payload: 'Invalid arguments for check_request_status: request_id: Required',
      });
    });

    it('should turn an unexpected client failure into an upstream result', async () => {
      mockIdentityClient.invoke = jest
        .fn()
        .mockRejectedValue(new Error('socket hang up'));

      const result = await registry.dispatch('get_identity_info', {
        user_id: 'Ram',
      });

      expect(result).toEqual({
        status: 'error',
        errorKind: 'upstream',
        payload: 'socket hang up',
      });
    });
  });

  describe('toLangChainTools', () => {
    it('should create one structured tool per definition', () => {
      const tools = registry.toLangChainTools();

      expect(tools.map((t) => t.name)).toEqual([
        'trigger_identity_refresh',
        'check_request_status',
        'get_identity_info',
      ]);
    });

    it('should return the dispatch result as JSON text', async () => {
      const [refreshTool] = registry.toLangChainTools();

      const output: unknown = await refreshTool.invoke({ user_id: 'Ram' });

      expect(output).toBe(
        JSON.stringify({ status: 'success', payload: { success: true } }),
      );
    });
  });
});
