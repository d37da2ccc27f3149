import { Module } from '@nestjs/common';
import { COMMAND_RUNNER } from './command-runner';
import { ShellCommandRunner } from './shell-command-runner';
import { StageExecutorService } from './stage-executor.service';
import { CommandToolchainProvisioner, TOOLCHAIN_PROVISIONER } from './toolchain-provisioner';
import { RunExecutorService } from './run-executor.service';

@Module({
  providers: [
    { provide: COMMAND_RUNNER, useClass: ShellCommandRunner },
    { provide: TOOLCHAIN_PROVISIONER, useClass: CommandToolchainProvisioner },
    StageExecutorService,
    RunExecutorService,
  ],
  exports: [StageExecutorService, RunExecutorService, COMMAND_RUNNER, TOOLCHAIN_PROVISIONER],
})
export class ExecutorModule {}
