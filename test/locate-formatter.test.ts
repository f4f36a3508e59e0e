import * as path from 'path';
import { promises as fs } from 'fs';
import { locateFormatter, NoFormatterFoundError } from '../lib/locate-formatter';
import { makeTempDir, writeExecutable, writeFile } from './helpers';

const SCRIPT = '#!/bin/sh\nexit 0\n';

let artifact: string;

beforeEach(async () => {
  artifact = await makeTempDir();
});

afterEach(async () => {
  await fs.rm(artifact, { recursive: true, force: true });
});

test('treefmt is preferred over other binaries', async () => {
  // GIVEN
  await writeExecutable(path.join(artifact, 'bin', 'alejandra'), SCRIPT);
  await writeExecutable(path.join(artifact, 'bin', 'treefmt'), SCRIPT);

  // THEN
  expect(await locateFormatter(artifact)).toEqual(path.join(artifact, 'bin', 'treefmt'));
});

test('only binary is chosen', async () => {
  await writeExecutable(path.join(artifact, 'bin', 'nixfmt'), SCRIPT);

  expect(await locateFormatter(artifact)).toEqual(path.join(artifact, 'bin', 'nixfmt'));
});

test('non-executable files are skipped', async () => {
  // GIVEN
  await writeFile(path.join(artifact, 'bin', 'README'), 'not a program');
  await writeExecutable(path.join(artifact, 'bin', 'nixfmt'), SCRIPT);

  // THEN
  expect(await locateFormatter(artifact)).toEqual(path.join(artifact, 'bin', 'nixfmt'));
});

test('non-executable treefmt falls through to the other binaries', async () => {
  // GIVEN
  await writeFile(path.join(artifact, 'bin', 'treefmt'), SCRIPT);
  await writeExecutable(path.join(artifact, 'bin', 'nixpkgs-fmt'), SCRIPT);

  // THEN
  expect(await locateFormatter(artifact)).toEqual(path.join(artifact, 'bin', 'nixpkgs-fmt'));
});

test('among several binaries the first by name is chosen', async () => {
  // GIVEN
  await writeExecutable(path.join(artifact, 'bin', 'zz-fmt'), SCRIPT);
  await writeExecutable(path.join(artifact, 'bin', 'aa-fmt'), SCRIPT);
  await writeExecutable(path.join(artifact, 'bin', 'mm-fmt'), SCRIPT);

  // THEN
  expect(await locateFormatter(artifact)).toEqual(path.join(artifact, 'bin', 'aa-fmt'));
});

test('artifact that is itself a script is run directly', async () => {
  const script = path.join(artifact, 'fmt-script');
  await writeExecutable(script, SCRIPT);

  expect(await locateFormatter(script)).toEqual(script);
});

test('empty bin directory is an error', async () => {
  // GIVEN
  await fs.mkdir(path.join(artifact, 'bin'));

  // WHEN
  const result = locateFormatter(artifact);

  // THEN
  await expect(result).rejects.toThrow(NoFormatterFoundError);
  await expect(result).rejects.toThrow(`No formatter found in ${path.join(artifact, 'bin')}`);
  await expect(result).rejects.toMatchObject({ exitCode: 1 });
});

test('missing bin directory is an error', async () => {
  await expect(locateFormatter(artifact)).rejects.toThrow(`No formatter found in ${path.join(artifact, 'bin')}`);
});
