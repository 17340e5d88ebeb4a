import { withController } from "./controller";

export async function excludeCmd(folder: string): Promise<void> {
  await withController(async controller => {
    await controller.excludeFolder(folder);
    console.log(`Excluded ${folder} from sync`);
  });
}

export async function includeCmd(folder: string): Promise<void> {
  const ok = await withController(controller => controller.includeFolder(folder));
  if (!ok) {
    process.exitCode = 1;
    return;
  }
  console.log(`Included ${folder} in sync`);
}

export async function foldersCmd(): Promise<void> {
  const excluded = await withController(controller => controller.selectExcludedFolders());
  if (excluded === false) {
    process.exitCode = 1;
    return;
  }
  console.log(excluded.length === 0 ? "No folders excluded" : `Excluded folders: ${excluded.join(", ")}`);
}

export async function moveCmd(newPath?: string): Promise<void> {
  const dir = await withController(async controller => {
    await controller.setDropboxDirectory(newPath);
    return controller.getDropboxDirectory();
  });
  console.log(`Dropbox directory: ${dir}`);
}

export async function unlinkCmd(): Promise<void> {
  await withController(controller => controller.unlink());
}
