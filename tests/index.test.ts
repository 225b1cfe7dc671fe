import { ExitCode, SSM_SDK_PACKAGE } from '../src/config.js';

const mockCliLoaded = jest.fn();

jest.mock('../src/utils/preflight.js', () => ({
  isPackageAvailable: jest.fn(() => false),
}));

jest.mock('../src/cli.js', () => {
  mockCliLoaded();
  return { main: jest.fn() };
});

describe('entry point', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should exit with 2 and never load the CLI when the SSM SDK is missing', () => {
    const exit = jest.spyOn(process, 'exit').mockImplementation(code => {
      throw new Error(`process.exit(${code})`);
    });
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(() =>
      jest.isolateModules(() => {
        require('../src/index.js');
      })
    ).toThrow(`process.exit(${ExitCode.MissingDependency})`);

    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(ExitCode.MissingDependency);
    expect(error).toHaveBeenCalledWith(expect.stringContaining(`${SSM_SDK_PACKAGE} is not installed`));
    expect(mockCliLoaded).not.toHaveBeenCalled();
  });
});
