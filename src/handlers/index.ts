import type { DescriptorHandler } from '../types';
import { parseMetadataFile } from './metadataFile';
import { parsePipfile } from './pipfile';
import { parsePipfileLock } from './pipfileLock';
import { parseRequirementsFile } from './requirementsFile';
import { parseSetupCfg } from './setupCfg';
import { parseSetupPy } from './setupPy';

// Patterns are fast-glob patterns relative to the project root.
export const HANDLERS: DescriptorHandler[] = [
  {
    datasourceId: 'pypi_sdist_pkginfo',
    pathPatterns: ['**/PKG-INFO'],
    description: 'PyPI extracted sdist PKG-INFO',
    documentationUrl: 'https://peps.python.org/pep-0314/',
    parse: (location) => parseMetadataFile(location, 'pypi_sdist_pkginfo')
  },
  {
    datasourceId: 'pypi_wheel_metadata',
    pathPatterns: ['**/*.dist-info/METADATA'],
    description: 'PyPI installed wheel METADATA',
    documentationUrl: 'https://packaging.python.org/en/latest/specifications/core-metadata/',
    parse: (location) => parseMetadataFile(location, 'pypi_wheel_metadata')
  },
  {
    datasourceId: 'pypi_setup_py',
    pathPatterns: ['**/*setup.py'],
    description: 'Python setup.py',
    documentationUrl: 'https://docs.python.org/3/distutils/setupscript.html',
    parse: parseSetupPy
  },
  {
    datasourceId: 'pypi_setup_cfg',
    pathPatterns: ['**/*setup.cfg'],
    description: 'Python setup.cfg',
    documentationUrl: 'https://peps.python.org/pep-0390/',
    parse: parseSetupCfg
  },
  {
    datasourceId: 'pipfile',
    pathPatterns: ['**/*Pipfile'],
    description: 'Pipfile',
    documentationUrl: 'https://github.com/pypa/pipfile',
    parse: parsePipfile
  },
  {
    datasourceId: 'pipfile_lock',
    pathPatterns: ['**/*Pipfile.lock'],
    description: 'Pipfile.lock',
    documentationUrl: 'https://github.com/pypa/pipfile',
    parse: parsePipfileLock
  },
  {
    datasourceId: 'pip_requirements',
    pathPatterns: [
      '**/*requirement*.txt',
      '**/*requirement*.pip',
      '**/*requirement*.in',
      '**/*requires.txt',
      '**/*requirements/*.txt',
      '**/*requirements/*.pip',
      '**/*requirements/*.in',
      '**/*reqs.txt'
    ],
    description: 'pip requirements file',
    documentationUrl: 'https://pip.pypa.io/en/latest/reference/requirements-file-format/',
    parse: parseRequirementsFile
  }
];
