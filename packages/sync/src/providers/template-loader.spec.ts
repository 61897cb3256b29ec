import { describe, expect, it } from 'vitest';

import { StackLoadError, loadStacks } from './template-loader.js';

function createReader(files: Readonly<Record<string, string>>) {
  return async (filePath: string): Promise<string> => {
    const text = files[filePath];
    if (text === undefined) {
      throw new Error(`ENOENT: ${filePath}`);
    }
    return text;
  };
}

const ROOT_TEMPLATE = `
Resources:
  Api:
    Type: AWS::Serverless::Function
    Properties:
      CodeUri: src/api
      Handler: index.handler
  Remote:
    Type: AWS::Serverless::Function
    Properties:
      CodeUri: s3://artifacts/api.zip
  Container:
    Type: AWS::Serverless::Function
    Properties:
      PackageType: Image
    Metadata:
      DockerContext: ./image
  Definition:
    Type: AWS::Serverless::Api
    Properties:
      DefinitionUri: openapi.yaml
  Rest:
    Type: AWS::ApiGateway::RestApi
    Properties:
      BodyS3Location: ./api.yaml
  Nested:
    Type: AWS::Serverless::Application
    Properties:
      Location: nested/template.yaml
  External:
    Type: AWS::CloudFormation::Stack
    Properties:
      TemplateURL: https://example.test/template.yaml
`;

const NESTED_TEMPLATE = `
Resources:
  Worker:
    Type: AWS::Lambda::Function
    Properties:
      Code: ../worker
`;

describe('loadStacks', () => {
  it('loads the root stack with paths rebased onto the template directory', async () => {
    const [root] = await loadStacks('/workspace/app/template.yaml', {
      readTextFile: createReader({
        '/workspace/app/template.yaml': ROOT_TEMPLATE,
        '/workspace/app/nested/template.yaml': NESTED_TEMPLATE,
      }),
    });

    expect(root?.stackPath).toBe('');
    expect(root?.name).toBe('template');
    expect(root?.location).toBe('/workspace/app/template.yaml');
    expect(root?.resources['Api']?.Properties).toEqual({
      CodeUri: '/workspace/app/src/api',
      Handler: 'index.handler',
    });
    expect(root?.resources['Remote']?.Properties?.['CodeUri']).toBe('s3://artifacts/api.zip');
    expect(root?.resources['Container']?.Metadata).toEqual({
      DockerContext: '/workspace/app/image',
    });
    expect(root?.resources['Definition']?.Properties?.['DefinitionUri']).toBe(
      '/workspace/app/openapi.yaml',
    );
    expect(root?.resources['Rest']?.Properties?.['BodyS3Location']).toBe(
      '/workspace/app/api.yaml',
    );
  });

  it('loads local nested stacks as children', async () => {
    const [root] = await loadStacks('/workspace/app/template.yaml', {
      stackName: 'app',
      readTextFile: createReader({
        '/workspace/app/template.yaml': ROOT_TEMPLATE,
        '/workspace/app/nested/template.yaml': NESTED_TEMPLATE,
      }),
    });

    expect(root?.name).toBe('app');
    expect(root?.children).toHaveLength(1);
    expect(root?.children?.[0]).toEqual({
      stackPath: 'Nested',
      name: 'Nested',
      location: '/workspace/app/nested/template.yaml',
      resources: {
        Worker: { Type: 'AWS::Lambda::Function', Properties: { Code: '/workspace/app/worker' } },
      },
    });
  });

  it('returns an empty resource map when Resources is absent', async () => {
    const [root] = await loadStacks('/workspace/empty.yaml', {
      readTextFile: createReader({ '/workspace/empty.yaml': 'Description: empty\n' }),
    });

    expect(root?.resources).toEqual({});
    expect(root?.children).toBeUndefined();
  });

  it('fails when the template cannot be read', async () => {
    await expect(
      loadStacks('/workspace/missing.yaml', { readTextFile: createReader({}) }),
    ).rejects.toThrow(new StackLoadError('Unable to read template /workspace/missing.yaml.', ''));
  });

  it('fails when the template is not valid YAML', async () => {
    await expect(
      loadStacks('/workspace/broken.yaml', {
        readTextFile: createReader({ '/workspace/broken.yaml': 'Resources: [' }),
      }),
    ).rejects.toBeInstanceOf(StackLoadError);
  });

  it('fails when a resource has no Type', async () => {
    await expect(
      loadStacks('/workspace/untyped.yaml', {
        readTextFile: createReader({
          '/workspace/untyped.yaml': 'Resources:\n  Fn:\n    Properties: {}\n',
        }),
      }),
    ).rejects.toThrow('Resource Fn in /workspace/untyped.yaml must declare a Type.');
  });

  it('fails when Resources is not a mapping', async () => {
    await expect(
      loadStacks('/workspace/list.yaml', {
        readTextFile: createReader({ '/workspace/list.yaml': 'Resources:\n  - Fn\n' }),
      }),
    ).rejects.toThrow('Resources in /workspace/list.yaml must be a mapping.');
  });

  it('fails when a template nests itself', async () => {
    await expect(
      loadStacks('/workspace/loop.yaml', {
        readTextFile: createReader({
          '/workspace/loop.yaml':
            'Resources:\n  Self:\n    Type: AWS::Serverless::Application\n    Properties:\n      Location: ./loop.yaml\n',
        }),
      }),
    ).rejects.toThrow('Template /workspace/loop.yaml nests itself.');
  });
});
