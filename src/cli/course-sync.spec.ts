/**
 * CLI Option Parsing Tests
 */

import { createProgram } from './course-sync';
import {
  handleExport,
  handleImport,
  handlePublish,
  handleRegistryStats,
  handleSuggestIncludes,
} from './handlers/sync-handlers';
import { ServiceContainer } from './service-container';

jest.mock('./handlers/sync-handlers');

describe('course-sync CLI', () => {
  let container: ServiceContainer;

  beforeEach(() => {
    jest.clearAllMocks();
    container = new ServiceContainer({ console: { log: jest.fn(), error: jest.fn() }, process: { exit: jest.fn(), env: {} } });
  });

  it('should pass publish options to the handler', async () => {
    // Act
    await createProgram(container).parseAsync(['publish', '--course-root', 'geo', '--prune', '-p', 'geo.imscc'], {
      from: 'user',
    });

    // Assert
    expect(jest.mocked(handlePublish)).toHaveBeenCalledWith(
      { courseRoot: 'geo', prune: true, package: 'geo.imscc' },
      container
    );
  });

  it('should default the course root to the working directory', async () => {
    // Act
    await createProgram(container).parseAsync(['registry-stats'], { from: 'user' });

    // Assert
    expect(jest.mocked(handleRegistryStats)).toHaveBeenCalledWith({ courseRoot: '.' }, container);
  });

  it('should pass export overrides', async () => {
    // Act
    await createProgram(container).parseAsync(['export', '-o', 'out.imscc', '--title', 'Geo Honors'], { from: 'user' });

    // Assert
    expect(jest.mocked(handleExport)).toHaveBeenCalledWith(
      { courseRoot: '.', output: 'out.imscc', title: 'Geo Honors' },
      container
    );
  });

  it('should take the import source as an argument', async () => {
    // Act
    await createProgram(container).parseAsync(['import', '1234', '--output', 'geo'], { from: 'user' });

    // Assert
    expect(jest.mocked(handleImport)).toHaveBeenCalledWith('1234', { output: 'geo' }, container);
  });

  it('should pass the course root to suggest-includes', async () => {
    // Act
    await createProgram(container).parseAsync(['suggest-includes', '-c', 'geo'], { from: 'user' });

    // Assert
    expect(jest.mocked(handleSuggestIncludes)).toHaveBeenCalledWith({ courseRoot: 'geo' }, container);
  });
});
