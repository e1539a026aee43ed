export const USAGE = `fixdir - prepare filesystem fixtures for tests

Usage: fixdir <command> [options]

Commands:
  reset <path>                 Create <path>, or empty it if it exists
  copy <source> <destination>  Copy a directory tree, overwriting matching files
  verify <source> <destination>
                               Check that every source file was copied intact
  prepare [name...]            Reset and fill the work directories in fixtures.toml

Options:
  --config <file>  Config file for prepare (default: ./fixtures.toml)
  --help, -h       Show this help message
  --version, -V    Show version`;
