import path from 'node:path';

import { describe, expect, it, vi } from 'vitest';

import { MissingDefinitionUriError, ResourceNotFoundError } from '../domain/errors.js';
import type { FileChangeEvent } from '../domain/ports/watchers.js';
import { ScriptedValidator, createStack, onlyTarget } from '../testing/fixtures.js';
import { ApiDefinitionTrigger } from './api-definition-trigger.js';
import { matchesRule } from './watch-targets.js';

const stacks = [
  createStack({
    Api: {
      Type: 'AWS::Serverless::Api',
      Properties: { StageName: 'dev', DefinitionUri: '/app/openapi.yaml' },
    },
    InlineApi: { Type: 'AWS::Serverless::Api', Properties: { StageName: 'dev' } },
    BareApi: { Type: 'AWS::Serverless::HttpApi' },
    RemoteDefinitionApi: {
      Type: 'AWS::Serverless::Api',
      Properties: { DefinitionUri: { Bucket: 'specs', Key: 'openapi.yaml' } },
    },
    Rest: {
      Type: 'AWS::ApiGateway::RestApi',
      Properties: { Name: 'rest', BodyS3Location: '/app/rest.yaml' },
    },
    Http: { Type: 'AWS::ApiGatewayV2::Api', Properties: { BodyS3Location: '/app/http.yaml' } },
    InlineRest: {
      Type: 'AWS::ApiGateway::RestApi',
      Properties: { Body: { openapi: '3.0.1' } },
    },
    MislabelledRest: {
      Type: 'AWS::ApiGateway::RestApi',
      Properties: { DefinitionUri: '/app/openapi.yaml' },
    },
  }),
];

const event: FileChangeEvent = { type: 'updated', path: '/app/openapi.yaml', isDirectory: false };

describe('ApiDefinitionTrigger', () => {
  it('builds a validator for the definition file', () => {
    const createValidator = vi.fn(() => new ScriptedValidator([true]));

    const trigger = new ApiDefinitionTrigger('Api', stacks, vi.fn(), { createValidator });

    expect(trigger.definitionFile).toBe('/app/openapi.yaml');
    expect(createValidator).toHaveBeenCalledWith('/app/openapi.yaml');
  });

  it('resolves one single-file target for the definition', () => {
    const trigger = new ApiDefinitionTrigger('Api', stacks, vi.fn(), {
      createValidator: () => new ScriptedValidator([true]),
    });

    const target = onlyTarget(trigger.resolve());

    expect(trigger.kind).toBe('api-definition');
    expect(target.path).toBe('/app');
    expect(target.recursive).toBe(false);
    expect(matchesRule(target.matchRule, path.resolve('/app/openapi.yaml'))).toBe(true);
    expect(matchesRule(target.matchRule, '/app/openapi.yml')).toBe(false);
  });

  it('forwards the event only when the definition validates', () => {
    const onCodeChange = vi.fn();
    const trigger = new ApiDefinitionTrigger('Api', stacks, onCodeChange, {
      createValidator: () => new ScriptedValidator([false, true]),
    });
    const target = onlyTarget(trigger.resolve());

    target.onEvent(event);
    expect(onCodeChange).not.toHaveBeenCalled();

    target.onEvent(event);
    expect(onCodeChange).toHaveBeenCalledTimes(1);
    expect(onCodeChange.mock.calls[0]?.[0]).toBe(event);
  });

  it.each([
    ['Rest', '/app/rest.yaml'],
    ['Http', '/app/http.yaml'],
  ])('reads BodyS3Location for the API Gateway resource %s', (resourceId, file) => {
    const trigger = new ApiDefinitionTrigger(resourceId, stacks, vi.fn(), {
      createValidator: () => new ScriptedValidator([true]),
    });

    expect(trigger.definitionFile).toBe(file);
    expect(onlyTarget(trigger.resolve()).matchRule).toMatchObject({ kind: 'exact-file', file });
  });

  it('fails with ResourceNotFoundError for unknown identifiers', () => {
    expect(() => new ApiDefinitionTrigger('Missing', stacks, vi.fn())).toThrow(
      ResourceNotFoundError,
    );
  });

  it.each(['InlineApi', 'BareApi', 'RemoteDefinitionApi', 'InlineRest', 'MislabelledRest'])(
    'fails with MissingDefinitionUriError for %s',
    (resourceId) => {
      const createValidator = vi.fn(() => new ScriptedValidator([true]));

      expect(
        () => new ApiDefinitionTrigger(resourceId, stacks, vi.fn(), { createValidator }),
      ).toThrow(MissingDefinitionUriError);
      expect(createValidator).not.toHaveBeenCalled();
    },
  );
});
