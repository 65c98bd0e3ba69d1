import { IsEmail, IsNotEmpty, IsString } from 'class-validator';
import { Trim } from '../../../../shared/decorators/trim.decorator';

export class CreateUserDto {
  @Trim()
  @IsString()
  @IsNotEmpty()
  name!: string;

  @Trim()
  @IsEmail()
  email!: string;
}
