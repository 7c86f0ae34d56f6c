export interface IFileSystem {
  readFile(path: string): Promise<string>;
  exists(path: string): Promise<boolean>;
}
